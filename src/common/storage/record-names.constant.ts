/**
 * File names of the records kept in the tgsend home directory
 */
export const RECORD_FILES = {
  CREDENTIALS: 'credentials.json',
  SESSION: 'session.json',
  PINS: 'pins.json',
} as const;
