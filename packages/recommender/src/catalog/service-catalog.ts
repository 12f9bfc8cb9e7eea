import type { Service, ServiceId } from '../types.js';

const EXCLUDED_PATTERN = /birth|death/i;
const CASTE_TARGETED_PATTERN = /caste/i;

const matches = (pattern: RegExp, service: Service): boolean =>
  pattern.test(service.name) || pattern.test(service.domain);

/**
 * Canonical service list. Birth/death services stay known (so rankers can
 * recognise and drop them) but never resolve to a public name.
 */
export class ServiceCatalog {
  private readonly byId = new Map<ServiceId, Service>();
  private readonly excluded = new Set<ServiceId>();
  private readonly casteTargeted = new Set<ServiceId>();

  constructor(services: readonly Service[]) {
    for (const service of services) {
      if (this.byId.has(service.id)) {
        continue;
      }
      this.byId.set(service.id, Object.freeze({ ...service }));
      if (matches(EXCLUDED_PATTERN, service)) {
        this.excluded.add(service.id);
      }
      if (matches(CASTE_TARGETED_PATTERN, service)) {
        this.casteTargeted.add(service.id);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  has(serviceId: ServiceId): boolean {
    return this.byId.has(serviceId);
  }

  resolveName(serviceId: ServiceId): string | undefined {
    if (this.excluded.has(serviceId)) {
      return undefined;
    }
    return this.byId.get(serviceId)?.name;
  }

  isExcludedCategory(serviceId: ServiceId): boolean {
    return this.excluded.has(serviceId);
  }

  isCasteTargeted(serviceId: ServiceId): boolean {
    return this.casteTargeted.has(serviceId);
  }

  listAll(): Array<{ id: ServiceId; name: string }> {
    return [...this.byId.values()]
      .filter((service) => !this.excluded.has(service.id))
      .sort((a, b) => a.id - b.id)
      .map((service) => ({ id: service.id, name: service.name }));
  }
}
