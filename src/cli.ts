import { Command } from "commander";
import { config } from "./config.js";
import { initDb } from "./db.js";
import { createEngine } from "./engine.js";
import { errorMessage } from "./errors.js";
import { parseNumber } from "./cli-options.js";
import { cronTicker } from "./scheduler.js";
import { formatStops } from "./services/notifier.js";
import type { Tracker } from "./types.js";

const engine = createEngine(config);
await initDb(engine.pool);

const program = new Command();

program
  .name("fare-tracker")
  .description("Track flight fares and get alerts when they drop under your price")
  .requiredOption("-u, --user <username>", "Username to operate as");

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function money(value: number | null): string {
  return value == null ? "-" : `$${value.toFixed(2)}`;
}

async function resolveUser(): Promise<string> {
  const username: string = program.opts().user;
  const user = await engine.users.findUserByUsername(username);
  if (!user) {
    console.error(`Error: User "${username}" not found.`);
    fail(`Register first with: npm run cli -- -u ${username} register -p <password>`);
  }
  return user.id;
}

program
  .command("register")
  .description("Create a new user account")
  .requiredOption("-p, --password <password>", "Password (min 6 characters)")
  .option("--email <address>", "Where fare alerts are emailed")
  .option("--phone <number>", "Where fare alerts are texted (E.164)")
  .action(async (opts: { password: string; email?: string; phone?: string }) => {
    const username: string = program.opts().user;
    if (opts.password.length < 6) fail("Password must be at least 6 characters");
    const user = await engine.users.createUser(username, opts.password, {
      email: opts.email ?? null,
      phone: opts.phone ?? null,
    });
    console.log(`User "${user.username}" created (id: ${user.id}).`);
  });

program
  .command("contact")
  .description("Set where alerts are delivered")
  .option("--email <address>", "Email address (empty string clears it)")
  .option("--phone <number>", "Phone number (empty string clears it)")
  .action(async (opts: { email?: string; phone?: string }) => {
    const userId = await resolveUser();
    await engine.users.updateContact(userId, {
      email: opts.email === undefined ? undefined : opts.email || null,
      phone: opts.phone === undefined ? undefined : opts.phone || null,
    });
    const contact = await engine.users.getContact(userId);
    console.log(`Email: ${contact?.email ?? "-"}`);
    console.log(`Phone: ${contact?.phone ?? "-"}`);
  });

program
  .command("track <origin> <destination>")
  .description("Watch a route and get notified when the fare drops to your price")
  .requiredOption("--max-price <price>", "Alert when the fare is at or below this", parseNumber("--max-price"))
  .option("--start <date>", "First travel date (YYYY-MM-DD) or 'this_month'", "this_month")
  .option("--days <n>", "Number of days to watch from --start", parseNumber("--days"), 30)
  .option("--adults <n>", "Number of adult passengers", parseNumber("--adults"), 1)
  .option("--seat-class <class>", "economy, premium-economy, business or first", "economy")
  .option("--max-stops <n>", "Maximum number of stops: 0, 1 or 2", parseNumber("--max-stops"))
  .action(
    async (
      origin: string,
      destination: string,
      opts: { maxPrice: number; start: string; days: number; adults: number; seatClass: string; maxStops?: number },
    ) => {
      const userId = await resolveUser();
      const request = {
        origin,
        destination,
        maxPrice: opts.maxPrice,
        range: opts.start.toLowerCase() === "this_month"
          ? { kind: "month" as const }
          : { kind: "days" as const, start: opts.start, days: opts.days },
        adults: opts.adults,
        seatClass: opts.seatClass,
        maxStops: opts.maxStops ?? null,
      };
      const tracker = await engine.trackers.create(userId, request);

      console.log(`\nTracking ${tracker.origin} -> ${tracker.destination}`);
      console.log(`  ID:         ${tracker.id.slice(0, 8)}`);
      console.log(`  Dates:      ${tracker.startDate} to ${tracker.endDate} (exclusive)`);
      console.log(`  Alert:      <= ${money(tracker.maxPrice)}`);
      console.log(`  Passengers: ${tracker.adults} adult(s), ${tracker.seatClass}`);
      if (tracker.maxStops != null) console.log(`  Max stops:  ${tracker.maxStops}`);
    },
  );

program
  .command("list")
  .description("List your trackers")
  .action(async () => {
    const userId = await resolveUser();
    const trackers = await engine.trackers.list(userId);
    if (trackers.length === 0) {
      console.log("No trackers configured. Use 'track' to create one.");
      return;
    }

    console.log(
      `\n${"ID".padEnd(10)} ${"Route".padEnd(11)} ${"Dates".padEnd(24)} ${"Alert".padEnd(10)} ${"Last".padEnd(10)} ${"Best".padEnd(10)} Last Checked`,
    );
    console.log("-".repeat(100));
    for (const t of trackers) console.log(formatRow(t));
    console.log();
  });

function formatRow(t: Tracker): string {
  const route = `${t.origin}->${t.destination}`;
  const dates = `${t.startDate}..${t.endDate}`;
  const checked = t.stale
    ? "stale (dates passed)"
    : t.lastCheckedAt
      ? new Date(t.lastCheckedAt).toLocaleString()
      : "Not checked yet";
  return `${t.id.slice(0, 8).padEnd(10)} ${route.padEnd(11)} ${dates.padEnd(24)} ${money(t.maxPrice).padEnd(10)} ${money(t.lastPrice).padEnd(10)} ${money(t.bestPrice).padEnd(10)} ${checked}`;
}

program
  .command("remove <id>")
  .description("Stop tracking (full id or the short id from 'list')")
  .action(async (id: string) => {
    const userId = await resolveUser();
    const tracker = await engine.trackers.remove(userId, id);
    console.log(`Stopped tracking ${tracker.origin} -> ${tracker.destination} (${tracker.id.slice(0, 8)}).`);
  });

program
  .command("search <origin> <destination> <date>")
  .description("One-off search, showing the cheapest flights for a date")
  .option("--adults <n>", "Number of adult passengers", parseNumber("--adults"), 1)
  .option("--seat-class <class>", "economy, premium-economy, business or first", "economy")
  .option("--max-stops <n>", "Maximum number of stops: 0, 1 or 2", parseNumber("--max-stops"))
  .option("--return <date>", "Return date for a round trip (YYYY-MM-DD)")
  .action(
    async (
      origin: string,
      destination: string,
      date: string,
      opts: { adults: number; seatClass: string; maxStops?: number; return?: string },
    ) => {
      const result = await engine.searchFlights({
        origin,
        destination,
        date,
        returnDate: opts.return,
        adults: opts.adults,
        seatClass: opts.seatClass,
        maxStops: opts.maxStops ?? null,
      });
      if (result.itineraries.length === 0) {
        console.log(`No flights found for ${origin.toUpperCase()} -> ${destination.toUpperCase()} on ${date}.`);
        return;
      }
      const top = [...result.itineraries].sort((a, b) => a.price - b.price).slice(0, 5);
      const trip = opts.return ? `${date}, returning ${opts.return}` : date;
      console.log(`\n${origin.toUpperCase()} -> ${destination.toUpperCase()} on ${trip}`);
      console.log(`Price level: ${result.priceLevel ?? "unknown"}\n`);
      for (const it of top) {
        console.log(
          `  ${money(it.price).padEnd(10)} ${formatStops(it.stops).padEnd(14)} ${(it.duration ?? "").padEnd(12)} ${it.carrier ?? ""}`,
        );
      }
      console.log();
    },
  );

program
  .command("check")
  .description("Run one poll cycle now over every due tracker")
  .action(async () => {
    const report = await engine.scheduler.runCycle();
    console.log(
      `Checked ${report.checked}, failed ${report.failed}, stale ${report.stale}, alerts sent ${report.notified}.`,
    );
  });

program
  .command("run")
  .description("Start the poll scheduler and keep running until interrupted")
  .action(async () => {
    console.log(`Schedule: ${config.tickCron} (each tracker every ${config.pollIntervalHours}h)`);
    engine.scheduler.start(cronTicker(config.tickCron));
    console.log("Scheduler running. Press Ctrl+C to stop.\n");
    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });
  });

try {
  await program.parseAsync();
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
} finally {
  await engine.close();
}
