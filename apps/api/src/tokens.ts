export const RECOMMENDATION_ENGINE = 'RECOMMENDATION_ENGINE';
export const APP_LOGGER = 'APP_LOGGER';
