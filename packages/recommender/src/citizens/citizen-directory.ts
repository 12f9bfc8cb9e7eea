import type { ServiceCatalog } from '../catalog/service-catalog.js';
import type {
  Citizen,
  CitizenId,
  CitizenProfile,
  MaskedName,
  ServiceId,
  ServiceUsageRecord,
  UsageHistory
} from '../types.js';

export const MASKED_NAME: MaskedName = '####';
export const BLANK_NAME: MaskedName = '--';

export interface ServiceDelivery {
  citizenId: CitizenId;
  serviceId: ServiceId;
  deliveredOn: string;
}

interface UsageTally {
  serviceId: ServiceId;
  count: number;
  lastDeliveredOn: string;
}

export const normalizePhone = (phone: string): string => phone.trim();

const maskName = (name: string): MaskedName => (name.trim().length > 0 ? MASKED_NAME : BLANK_NAME);

const toProfile = (citizen: Citizen): CitizenProfile =>
  Object.freeze({
    ...citizen,
    name: maskName(citizen.name)
  });

/**
 * Citizens keyed by id and phone, plus per-citizen usage tallies.
 * True names stay in here; every public accessor returns masked profiles.
 */
export class CitizenDirectory {
  private readonly byId = new Map<CitizenId, Citizen>();
  private readonly byPhone = new Map<string, CitizenId[]>();
  private readonly usage = new Map<CitizenId, Map<ServiceId, UsageTally>>();

  constructor(
    private readonly catalog: ServiceCatalog,
    citizens: readonly Citizen[],
    deliveries: readonly ServiceDelivery[] = [],
    readonly available = true
  ) {
    for (const citizen of citizens) {
      if (this.byId.has(citizen.citizenId)) {
        continue;
      }
      this.byId.set(citizen.citizenId, { ...citizen });
      const phone = normalizePhone(citizen.phone);
      if (phone.length === 0) {
        continue;
      }
      const ids = this.byPhone.get(phone) ?? [];
      ids.push(citizen.citizenId);
      this.byPhone.set(phone, ids);
    }

    for (const delivery of deliveries) {
      let tallies = this.usage.get(delivery.citizenId);
      if (!tallies) {
        tallies = new Map();
        this.usage.set(delivery.citizenId, tallies);
      }
      const tally = tallies.get(delivery.serviceId);
      if (tally) {
        tally.count += 1;
        if (delivery.deliveredOn > tally.lastDeliveredOn) {
          tally.lastDeliveredOn = delivery.deliveredOn;
        }
      } else {
        tallies.set(delivery.serviceId, {
          serviceId: delivery.serviceId,
          count: 1,
          lastDeliveredOn: delivery.deliveredOn
        });
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  findByPhone(phone: string): CitizenProfile[] {
    const ids = this.byPhone.get(normalizePhone(phone)) ?? [];
    const profiles: CitizenProfile[] = [];
    for (const id of ids) {
      const citizen = this.byId.get(id);
      if (citizen) {
        profiles.push(toProfile(citizen));
      }
    }
    return profiles;
  }

  findById(citizenId: CitizenId): CitizenProfile | undefined {
    const citizen = this.byId.get(citizenId.trim());
    return citizen ? toProfile(citizen) : undefined;
  }

  usageHistory(citizenId: CitizenId): ServiceUsageRecord[] {
    const tallies = this.usage.get(citizenId.trim());
    if (!tallies) {
      return [];
    }

    const records: ServiceUsageRecord[] = [];
    for (const tally of tallies.values()) {
      const serviceName = this.catalog.resolveName(tally.serviceId);
      if (serviceName === undefined) {
        continue;
      }
      records.push({ citizenId: citizenId.trim(), serviceId: tally.serviceId, serviceName, count: tally.count });
    }

    return records.sort((a, b) => b.count - a.count || a.serviceId - b.serviceId);
  }

  summarizeUsage(citizenId: CitizenId): UsageHistory {
    const services = this.usageHistory(citizenId).map(({ serviceId, serviceName, count }) => ({
      serviceId,
      serviceName,
      count
    }));
    return { totalUniqueServices: services.length, services };
  }

  /** Distinct resolvable services, most recently delivered first. */
  recentServiceIds(citizenId: CitizenId): ServiceId[] {
    const tallies = this.usage.get(citizenId.trim());
    if (!tallies) {
      return [];
    }
    return [...tallies.values()]
      .filter((tally) => this.catalog.resolveName(tally.serviceId) !== undefined)
      .sort((a, b) => {
        if (a.lastDeliveredOn !== b.lastDeliveredOn) {
          return a.lastDeliveredOn < b.lastDeliveredOn ? 1 : -1;
        }
        return a.serviceId - b.serviceId;
      })
      .map((tally) => tally.serviceId);
  }
}
