/**
 * @tiersync/renter
 * 
 * Remote store layer.
 * 
 * Supported stores:
 * - Sia renter HTTP API
 */

export { SiaRenterClient, type SiaRenterConfig } from './siaRenterClient.js';

export {
  normalizeRemotePath,
  joinRemotePath,
  isBelowRemotePath,
  rebaseRemotePath,
  encodeRemotePath,
} from './remotePath.js';
