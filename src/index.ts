import { config, isEmailConfigured, isSmsConfigured } from "./config.js";
import { initDb } from "./db.js";
import { createEngine } from "./engine.js";
import { cronTicker } from "./scheduler.js";
import { createApp } from "./server.js";

const isProduction = process.env.NODE_ENV === "production";
const engine = createEngine(config);
await initDb(engine.pool);

const app = createApp({
  trackers: engine.trackers,
  users: engine.users,
  searchFlights: engine.searchFlights,
  sessionSecret: config.sessionSecret,
  isProduction,
});

console.log("Fare Tracker");
console.log("============");
console.log(`Poll interval: every ${config.pollIntervalHours}h (tick: ${config.tickCron})`);
console.log(`Cooldown:      ${config.cooldownHours}h`);
console.log(`Sampling:      ${config.samplingBudget} date(s) per tracker, ${config.concurrency} worker(s)`);
console.log(`Email:         ${isEmailConfigured() ? "configured" : "not configured"}`);
console.log(`SMS:           ${isSmsConfigured() ? "configured" : "not configured"}`);
console.log();

const server = app.listen(config.port, () => {
  console.log(`API listening on http://localhost:${config.port}`);
  engine.scheduler.start(cronTicker(config.tickCron));
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n${signal} received, waiting for the current poll cycle...`);
  server.close();
  await engine.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  });
}
