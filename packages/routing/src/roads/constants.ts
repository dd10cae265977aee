/** Upper bound for speeds, in meters per second */
export const SPEED_OF_LIGHT = 299792458;

/** Speed limit used when a road is created without one (m/s) */
export const DEFAULT_SPEED_LIMIT = 19.5;

/** Road lengths are 32-bit integers */
export const MAX_LENGTH = 2147483647;
export const MIN_LENGTH = -2147483648;

/** Values a road is reset to when terminated */
export const TERMINATED_LENGTH = 1;
export const TERMINATED_SPEED = 0.1;
