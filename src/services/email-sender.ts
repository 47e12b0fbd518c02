import nodemailer from "nodemailer";
import type { OwnerContact, PriceAlert } from "../types.js";
import { formatStops, type NotificationChannel } from "./notifier.js";

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
}

export class EmailChannel implements NotificationChannel {
  readonly name = "Email";
  private transporter: nodemailer.Transporter | null = null;

  constructor(private readonly smtp: SmtpSettings) {}

  private getTransporter(): nodemailer.Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: this.smtp.host,
        port: this.smtp.port,
        secure: this.smtp.port === 465,
        auth: {
          user: this.smtp.user,
          pass: this.smtp.pass,
        },
      });
    }
    return this.transporter;
  }

  canDeliver(contact: OwnerContact): boolean {
    return !!contact.email;
  }

  async send(contact: OwnerContact, alert: PriceAlert): Promise<void> {
    if (!contact.email) throw new Error("owner has no email address");
    const { tracker, price, date, stops } = alert;

    const subject = `Fare Alert: ${tracker.origin} -> ${tracker.destination} for $${price.toFixed(2)}`;
    const lines = [
      `${tracker.origin} -> ${tracker.destination} on ${date}`,
      `Price: $${price.toFixed(2)} (${formatStops(stops)})`,
      `Your threshold: $${tracker.maxPrice.toFixed(2)}`,
    ];
    if (alert.carrier) lines.push(`Flight: ${alert.carrier}${alert.duration ? `, ${alert.duration}` : ""}`);
    lines.push(``, `Tracker ID: ${tracker.id.slice(0, 8)}`);

    await this.getTransporter().sendMail({
      from: this.smtp.user,
      to: contact.email,
      subject,
      text: lines.join("\n"),
    });
  }
}
