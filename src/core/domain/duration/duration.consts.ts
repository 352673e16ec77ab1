export const DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_MINUTE = 60;

export const DEFAULT_MAX_DURATION = "PT1H";
