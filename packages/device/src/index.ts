/**
 * @scanprobe/device
 *
 * UI automation (Maestro) and device control (adb) for Android targets.
 */

export * from './types.js';
export * from './hierarchy-parser.js';
export { MaestroClient, type MaestroClientOptions } from './maestro-client.js';
export {
  AdbDeviceControl,
  DEFAULT_ADB_TIMEOUTS,
  parseDeviceList,
  parseForegroundPackage,
  type AdbDeviceControlOptions,
  type AdbTimeouts,
} from './adb.js';
