import type { ServiceCatalog } from '../catalog/service-catalog.js';
import type { Audience, ServiceId } from '../types.js';

export const GENERAL_CASTE = 'general';
export const MINOR_AGE_LIMIT = 18;

export const isGeneralCaste = (caste: string | undefined): boolean =>
  caste !== undefined && caste.trim().toLowerCase() === GENERAL_CASTE;

export const isMinor = (age: number | null | undefined): boolean =>
  typeof age === 'number' && age < MINOR_AGE_LIMIT;

/**
 * Shared output filter for every ranker. It only removes entries; callers
 * rely on the input order surviving untouched.
 */
export class RecommendationPolicy {
  constructor(
    private readonly catalog: ServiceCatalog,
    private readonly minorEligible: ReadonlySet<ServiceId> | null = null
  ) {}

  get restrictsMinors(): boolean {
    return this.minorEligible !== null;
  }

  admits(serviceId: ServiceId, audience: Audience = {}): boolean {
    if (this.catalog.resolveName(serviceId) === undefined) {
      return false;
    }
    if (isGeneralCaste(audience.caste) && this.catalog.isCasteTargeted(serviceId)) {
      return false;
    }
    if (this.minorEligible && isMinor(audience.age) && !this.minorEligible.has(serviceId)) {
      return false;
    }
    return true;
  }

  /** Filters, then truncates to `limit`, then resolves names. */
  apply(serviceIds: readonly ServiceId[], audience: Audience = {}, limit = Number.POSITIVE_INFINITY): string[] {
    const names: string[] = [];
    for (const serviceId of serviceIds) {
      if (names.length >= limit) {
        break;
      }
      if (!this.admits(serviceId, audience)) {
        continue;
      }
      const name = this.catalog.resolveName(serviceId);
      if (name !== undefined) {
        names.push(name);
      }
    }
    return names;
  }
}
