export { systemClock, isoNow } from './clock.js';
export type { Clock } from './clock.js';
export {
  QmemError,
  StorageIOError,
  MigrationError,
  NotFoundError,
  ValidationError,
  ConfigError,
} from './errors.js';
export type { StorageOperation } from './errors.js';
