/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_MINUTE: 60000,
  MINUTES_PER_HOUR: 60,
} as const;
