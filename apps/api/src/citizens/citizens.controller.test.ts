import { BadRequestException } from '@nestjs/common';
import { describe, expect, it } from 'vitest';
import { buildTestEngine } from '../__tests__/engine.js';
import { RecommendationsService } from '../recommendations/recommendations.service.js';
import { CitizensController } from './citizens.controller.js';

describe('CitizensController', () => {
  const controller = new CitizensController(new RecommendationsService(buildTestEngine()));

  it('returns an empty list for an unknown phone', () => {
    expect(controller.lookupByPhone('9000000002')).toEqual({ citizens: [] });
  });

  it('trims the phone before lookup', () => {
    expect(controller.lookupByPhone(' 9000000001 ').citizens.map((citizen) => citizen.citizen_id)).toEqual(['CIT_1']);
  });

  it('rejects a blank phone', () => {
    expect(() => controller.lookupByPhone('  ')).toThrow(BadRequestException);
  });

  it('returns zero usage for a citizen without deliveries', () => {
    expect(controller.citizenServices('CIT_2')).toEqual({ services: [], total_count: 0 });
  });
});
