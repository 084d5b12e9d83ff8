/**
 * Android device control over adb
 */

import { execa } from 'execa';
import { Logger, errorMessage, truncate } from '@scanprobe/shared';
import type { AppTarget, ConnectedDevice, DeviceControl, DeviceInfo } from './types.js';

export interface AdbTimeouts {
  pushMs: number;
  launchMs: number;
  foregroundMs: number;
  tapMs: number;
  intentMs: number;
  queryMs: number;
}

export const DEFAULT_ADB_TIMEOUTS: AdbTimeouts = {
  pushMs: 30000,
  launchMs: 3000,
  foregroundMs: 3000,
  tapMs: 2000,
  intentMs: 5000,
  queryMs: 5000,
};

export interface AdbDeviceControlOptions {
  /** Serial passed as `-s`; omitted when only one device is attached */
  deviceId?: string;
  adbPath?: string;
  timeouts?: Partial<AdbTimeouts>;
  logger?: Logger;
}

interface AdbOutput {
  ok: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Package that currently holds window focus, from `dumpsys window` output.
 */
export function parseForegroundPackage(dumpsys: string): string | null {
  const focus =
    dumpsys.match(/mCurrentFocus=Window\{[^}]*\s([\w.]+)\/[^\s}]+\}/) ??
    dumpsys.match(/mFocusedApp=.*?\s([\w.]+)\/[^\s}]+/);
  return focus ? focus[1] : null;
}

/**
 * Devices from `adb devices` output, header and blank lines skipped.
 */
export function parseDeviceList(output: string): ConnectedDevice[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('List of devices') && !line.startsWith('*'))
    .map((line) => {
      const [serial, state = 'unknown'] = line.split(/\s+/);
      return { serial, state };
    });
}

export class AdbDeviceControl implements DeviceControl {
  private readonly deviceId?: string;
  private readonly adbPath: string;
  private readonly timeouts: AdbTimeouts;
  private readonly logger: Logger;

  constructor(options: AdbDeviceControlOptions = {}) {
    this.deviceId = options.deviceId;
    this.adbPath = options.adbPath ?? 'adb';
    this.timeouts = { ...DEFAULT_ADB_TIMEOUTS, ...options.timeouts };
    this.logger = options.logger ?? new Logger({ prefix: '[ADB]' });
  }

  private async adb(
    args: string[],
    timeoutMs: number,
    serial: string | null = this.deviceId ?? null
  ): Promise<AdbOutput> {
    const fullArgs = serial ? ['-s', serial, ...args] : args;

    try {
      const result = await execa(this.adbPath, fullArgs, { timeout: timeoutMs, reject: false });
      if (result.failed) {
        this.logger.debug(
          `adb ${args.join(' ')} failed${result.timedOut ? ' (timed out)' : ''}: ${truncate(result.stderr, 200)}`
        );
      }
      return { ok: !result.failed, stdout: result.stdout, stderr: result.stderr };
    } catch (error) {
      this.logger.debug(`adb ${args.join(' ')} could not run: ${errorMessage(error)}`);
      return { ok: false, stdout: '', stderr: errorMessage(error) };
    }
  }

  async pushFile(localPath: string, devicePath: string): Promise<boolean> {
    const result = await this.adb(['push', localPath, devicePath], this.timeouts.pushMs);
    if (result.ok) {
      this.logger.debug(`Pushed ${localPath} -> ${devicePath}`);
    }
    return result.ok;
  }

  async launch(target: AppTarget): Promise<boolean> {
    const result = await this.adb(
      ['shell', 'am', 'start', '-n', `${target.packageName}/${target.activity}`],
      this.timeouts.launchMs
    );
    return result.ok && !/Error:/.test(result.stdout + result.stderr);
  }

  async foregroundApp(): Promise<string | null> {
    const result = await this.adb(['shell', 'dumpsys', 'window', 'windows'], this.timeouts.foregroundMs);
    return result.ok ? parseForegroundPackage(result.stdout) : null;
  }

  async rawTap(x: number, y: number): Promise<boolean> {
    const result = await this.adb(
      ['shell', 'input', 'tap', String(Math.round(x)), String(Math.round(y))],
      this.timeouts.tapMs
    );
    return result.ok;
  }

  async viewImage(target: AppTarget, devicePath: string): Promise<boolean> {
    const result = await this.adb(
      [
        'shell',
        'am',
        'start',
        '-a',
        'android.intent.action.VIEW',
        '-d',
        `file://${devicePath}`,
        '-t',
        'image/*',
        '-n',
        `${target.packageName}/${target.activity}`,
      ],
      this.timeouts.intentMs
    );
    // am start exits 0 even when the intent is rejected
    return result.ok && !/Error:/.test(result.stdout + result.stderr);
  }

  // ===========================================================================
  // Host-level queries
  // ===========================================================================

  async listDevices(): Promise<ConnectedDevice[]> {
    const result = await this.adb(['devices'], this.timeouts.queryMs, null);
    return result.ok ? parseDeviceList(result.stdout) : [];
  }

  async getDeviceInfo(serial: string): Promise<DeviceInfo> {
    const prop = async (name: string): Promise<string> => {
      const result = await this.adb(['shell', 'getprop', name], this.timeouts.queryMs, serial);
      return result.ok && result.stdout.trim() ? result.stdout.trim() : 'Unknown';
    };

    return {
      serial,
      model: await prop('ro.product.model'),
      manufacturer: await prop('ro.product.manufacturer'),
      androidVersion: await prop('ro.build.version.release'),
      sdkVersion: await prop('ro.build.version.sdk'),
    };
  }

  async isPackageInstalled(packageName: string): Promise<boolean> {
    const result = await this.adb(
      ['shell', 'pm', 'list', 'packages', packageName],
      this.timeouts.queryMs
    );
    return result.ok && result.stdout.split('\n').some((line) => line.trim() === `package:${packageName}`);
  }

  /** First line of `adb version`, or null when adb is not on PATH */
  async version(): Promise<string | null> {
    const result = await this.adb(['version'], this.timeouts.queryMs, null);
    return result.ok ? (result.stdout.split('\n')[0]?.trim() ?? null) : null;
  }
}
