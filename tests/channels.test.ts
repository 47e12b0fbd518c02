import { describe, it, expect, vi, beforeEach } from "vitest";
import { EmailChannel } from "../src/services/email-sender.js";
import { SmsChannel } from "../src/services/sms-sender.js";
import type { PriceAlert } from "../src/types.js";
import { makeTracker } from "./helpers.js";

const mocks = vi.hoisted(() => ({
  sendMail: vi.fn(async (_message: unknown) => ({ messageId: "test" })),
  createMessage: vi.fn(async (_message: unknown) => ({ sid: "test" })),
}));

vi.mock("nodemailer", () => ({
  default: { createTransport: vi.fn(() => ({ sendMail: mocks.sendMail })) },
}));

vi.mock("twilio", () => ({
  default: vi.fn(() => ({ messages: { create: mocks.createMessage } })),
}));

const alert: PriceAlert = {
  tracker: makeTracker({ id: "3f2a9c1e-0000-4000-8000-000000000000" }),
  price: 350,
  date: "2026-11-11",
  stops: 0,
  priceLevel: "low",
  carrier: "Delta",
  duration: "2 hr 5 min",
};

beforeEach(() => {
  mocks.sendMail.mockClear();
  mocks.createMessage.mockClear();
});

describe("EmailChannel", () => {
  const channel = new EmailChannel({ host: "smtp.test", port: 587, user: "alerts@example.com", pass: "test-secret" });

  it("only delivers to owners with an email address", () => {
    expect(channel.canDeliver({ email: "a@example.com", phone: null })).toBe(true);
    expect(channel.canDeliver({ email: null, phone: "+15550100" })).toBe(false);
  });

  it("sends a plain-text fare alert", async () => {
    await channel.send({ email: "a@example.com", phone: null }, alert);
    expect(mocks.sendMail).toHaveBeenCalledWith({
      from: "alerts@example.com",
      to: "a@example.com",
      subject: "Fare Alert: RDU -> MIA for $350.00",
      text: [
        "RDU -> MIA on 2026-11-11",
        "Price: $350.00 (Nonstop)",
        "Your threshold: $400.00",
        "Flight: Delta, 2 hr 5 min",
        "",
        "Tracker ID: 3f2a9c1e",
      ].join("\n"),
    });
  });
});

describe("SmsChannel", () => {
  const channel = new SmsChannel({ accountSid: "AC-test", authToken: "test-secret", fromNumber: "+15550199" });

  it("only delivers to owners with a phone number", () => {
    expect(channel.canDeliver({ email: "a@example.com", phone: null })).toBe(false);
    expect(channel.canDeliver({ email: null, phone: "+15550100" })).toBe(true);
  });

  it("texts a short fare alert", async () => {
    await channel.send({ email: null, phone: "+15550100" }, alert);
    expect(mocks.createMessage).toHaveBeenCalledWith({
      body: "Fare Alert: RDU->MIA 2026-11-11 $350.00 (<= $400)",
      from: "+15550199",
      to: "+15550100",
    });
  });
});
