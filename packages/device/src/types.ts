/**
 * @scanprobe/device - Type definitions
 */

import type { Point, Size } from '@scanprobe/shared';
import type { ParsedHierarchy, UIElement } from './hierarchy-parser.js';

/**
 * How a locator value is matched against an element.
 *
 * - `text`: exact visible text
 * - `textContains`: visible text contains the value
 * - `accessibilityId`: exact content description
 * - `descriptionContains`: content description contains the value
 * - `resourceIdContains`: resource id contains the value
 * - `className`: exact widget class (usually combined with `index`)
 */
export type LocatorStrategy =
  | 'text'
  | 'textContains'
  | 'accessibilityId'
  | 'descriptionContains'
  | 'resourceIdContains'
  | 'className';

export interface Locator {
  strategy: LocatorStrategy;
  value: string;
  /** Only consider elements of this widget class (e.g. `android.widget.Button`) */
  className?: string;
  /** 1-based position among the matches */
  index?: number;
}

/** An element found on screen. Valid until the screen changes. */
export type ElementHandle = UIElement;

export type LocateResult =
  | { found: true; element: ElementHandle }
  | { found: false; reason: string };

/**
 * Session against the on-device UI surface.
 *
 * Lookups that find nothing return `{ found: false }`. Only `treeDump()` and
 * `hierarchy()` throw, with `AutomationSessionError`, when the link is down.
 */
export interface UiAutomationClient {
  start(): Promise<void>;
  stop(): Promise<void>;
  locate(locator: Locator, timeoutMs: number): Promise<LocateResult>;
  click(element: ElementHandle): Promise<boolean>;
  textOf(element: ElementHandle): Promise<string | null>;
  treeDump(): Promise<string>;
  hierarchy(): Promise<ParsedHierarchy>;
  screenshot(filePath: string): Promise<boolean>;
  /** Tap at absolute screen pixels */
  tap(x: number, y: number): Promise<boolean>;
  navigateBack(): Promise<boolean>;
  windowSize(): Promise<Size | null>;
}

/** Android package plus launcher activity */
export interface AppTarget {
  packageName: string;
  activity: string;
}

/**
 * Shell-level device commands. Failures come back as `false` / `null`.
 */
export interface DeviceControl {
  pushFile(localPath: string, devicePath: string): Promise<boolean>;
  launch(target: AppTarget): Promise<boolean>;
  foregroundApp(): Promise<string | null>;
  rawTap(x: number, y: number): Promise<boolean>;
  /** Opens an image on the device with an ACTION_VIEW intent aimed at the app */
  viewImage(target: AppTarget, devicePath: string): Promise<boolean>;
}

export interface ConnectedDevice {
  serial: string;
  state: string;
}

export interface DeviceInfo {
  serial: string;
  model: string;
  manufacturer: string;
  androidVersion: string;
  sdkVersion: string;
}

export type { Point, Size };
