import twilio from "twilio";
import type { OwnerContact, PriceAlert } from "../types.js";
import type { NotificationChannel } from "./notifier.js";

export interface TwilioSettings {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export class SmsChannel implements NotificationChannel {
  readonly name = "SMS";
  private client: ReturnType<typeof twilio> | null = null;

  constructor(private readonly settings: TwilioSettings) {}

  private getClient() {
    if (!this.client) {
      this.client = twilio(this.settings.accountSid, this.settings.authToken);
    }
    return this.client;
  }

  canDeliver(contact: OwnerContact): boolean {
    return !!contact.phone;
  }

  async send(contact: OwnerContact, alert: PriceAlert): Promise<void> {
    if (!contact.phone) throw new Error("owner has no phone number");
    const { tracker, price, date } = alert;

    const body = `Fare Alert: ${tracker.origin}->${tracker.destination} ${date} $${price.toFixed(2)} (<= $${tracker.maxPrice})`;

    await this.getClient().messages.create({
      body,
      from: this.settings.fromNumber,
      to: contact.phone,
    });
  }
}
