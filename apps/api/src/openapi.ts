import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

const document = {
  openapi: '3.0.3',
  info: {
    title: 'Seva Recommender API',
    version: '0.1.0'
  },
  paths: {
    '/api/health': {
      get: { summary: 'Health check', responses: { '200': { description: 'OK' } } }
    },
    '/api/services': {
      get: { summary: 'List selectable services', responses: { '200': { description: 'OK' } } }
    },
    '/api/districts': {
      get: { summary: 'List districts with rankings', responses: { '200': { description: 'OK' } } }
    },
    '/api/citizen/phone/{phone}': {
      get: {
        summary: 'Find citizens registered to a phone number',
        responses: {
          '200': { description: 'OK' },
          '503': { description: 'Citizen data not loaded' }
        }
      }
    },
    '/api/citizen/{citizenId}/services': {
      get: {
        summary: 'Service usage history for a citizen',
        responses: {
          '200': { description: 'OK' },
          '503': { description: 'Citizen data not loaded' }
        }
      }
    },
    '/api/recommend/phone': {
      post: {
        summary: 'Recommend for a known citizen',
        responses: {
          '200': { description: 'Recommendations' },
          '400': { description: 'Invalid request' },
          '404': { description: 'Citizen not found' }
        }
      }
    },
    '/api/recommend/manual': {
      post: {
        summary: 'Recommend for declared demographics',
        responses: {
          '200': { description: 'Recommendations' },
          '400': { description: 'Invalid request' }
        }
      }
    }
  }
};

await writeFile(resolve(process.cwd(), 'openapi.json'), JSON.stringify(document, null, 2));
