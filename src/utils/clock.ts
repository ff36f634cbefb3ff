import { Clock } from '../interfaces/token-bucket.interface';

/**
 * Wall-clock time rounded to whole seconds since epoch
 */
export const currentTimeInSeconds: Clock = () => Math.round(Date.now() / 1000);
