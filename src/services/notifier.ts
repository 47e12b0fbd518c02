import { DeliveryError, errorMessage, type ChannelFailure } from "../errors.js";
import type { Logger } from "../logger.js";
import type { OwnerContact, PriceAlert } from "../types.js";

export interface NotificationChannel {
  readonly name: string;
  canDeliver(contact: OwnerContact): boolean;
  send(contact: OwnerContact, alert: PriceAlert): Promise<void>;
}

export interface ContactDirectory {
  getContact(ownerId: string): Promise<OwnerContact | null>;
}

export interface AlertNotifier {
  notify(ownerId: string, alert: PriceAlert): Promise<DeliveryReport>;
}

export interface DeliveryReport {
  delivered: string[];
}

export function describeAlert(alert: PriceAlert): string {
  const { tracker, price, date } = alert;
  return `${tracker.origin} -> ${tracker.destination} on ${date}: $${price.toFixed(2)} (threshold $${tracker.maxPrice.toFixed(2)})`;
}

export function formatStops(stops: number | null): string {
  if (stops == null) return "Stops unknown";
  if (stops === 0) return "Nonstop";
  return `${stops} stop${stops === 1 ? "" : "s"}`;
}

export class Notifier implements AlertNotifier {
  constructor(
    private readonly channels: NotificationChannel[],
    private readonly directory: ContactDirectory,
    private readonly fallback: OwnerContact = { email: null, phone: null },
    private readonly logger: Logger = console,
  ) {}

  async notify(ownerId: string, alert: PriceAlert): Promise<DeliveryReport> {
    this.logger.log(`[ALERT] ${describeAlert(alert)}`);

    const contact = await this.resolveContact(ownerId);
    const usable = this.channels.filter((c) => c.canDeliver(contact));
    if (usable.length === 0) {
      throw new DeliveryError(`No delivery channel configured for owner ${ownerId}`);
    }

    const delivered: string[] = [];
    const failures: ChannelFailure[] = [];
    for (const channel of usable) {
      try {
        await channel.send(contact, alert);
        this.logger.log(`  -> ${channel.name} sent`);
        delivered.push(channel.name);
      } catch (err) {
        this.logger.error(`  -> ${channel.name} failed:`, errorMessage(err));
        failures.push({ channel: channel.name, message: errorMessage(err) });
      }
    }

    if (delivered.length === 0) {
      throw new DeliveryError(`All channels failed for owner ${ownerId}`, failures);
    }
    return { delivered };
  }

  private async resolveContact(ownerId: string): Promise<OwnerContact> {
    let own: OwnerContact | null;
    try {
      own = await this.directory.getContact(ownerId);
    } catch (err) {
      throw new DeliveryError(`Contact lookup failed for owner ${ownerId}: ${errorMessage(err)}`);
    }
    return {
      email: own?.email ?? this.fallback.email,
      phone: own?.phone ?? this.fallback.phone,
    };
  }
}
