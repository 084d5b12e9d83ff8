/**
 * In-process stand-ins for the automation client, the device and the clock.
 * Used by tests only.
 */

import type { Clock, Size } from '@scanprobe/shared';
import {
  matchLocator,
  parseHierarchy,
  type AppTarget,
  type DeviceControl,
  type ElementHandle,
  type LocateResult,
  type Locator,
  type MaestroTreeNode,
  type ParsedHierarchy,
  type UiAutomationClient,
} from '@scanprobe/device';

export interface ManualClock extends Clock {
  sleeps: number[];
}

export function manualClock(): ManualClock {
  let t = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

export interface NodeSpec {
  text?: string;
  desc?: string;
  className?: string;
  resourceId?: string;
  bounds?: string;
}

/**
 * A 1080x2400 screen holding the given nodes, in order.
 */
export function screen(...nodes: NodeSpec[]): ParsedHierarchy {
  const tree: MaestroTreeNode = {
    attributes: {},
    children: [
      {
        attributes: { class: 'android.widget.FrameLayout', bounds: '[0,0][1080,2400]' },
        children: nodes.map((node) => ({
          attributes: {
            class: node.className ?? 'android.widget.TextView',
            text: node.text,
            'content-desc': node.desc,
            'resource-id': node.resourceId,
            bounds: node.bounds ?? '[0,0][100,100]',
          },
        })),
      },
    ],
  };
  return parseHierarchy(tree);
}

/**
 * Automation client over a scripted sequence of screens. `hierarchy()` moves
 * to the next scripted entry (the last one sticks); lookups use the current
 * screen without advancing.
 */
export class FakeAutomationClient implements UiAutomationClient {
  current: ParsedHierarchy;
  readonly script: Array<ParsedHierarchy | Error> = [];
  readonly clicked: ElementHandle[] = [];
  readonly screenshots: string[] = [];
  hierarchyCalls = 0;
  backPresses = 0;
  size: Size | null = { width: 1080, height: 2400 };
  treeText = '{"dump":true}';
  onClick?: (element: ElementHandle) => void;
  onBack?: () => void;

  constructor(initial: ParsedHierarchy = screen()) {
    this.current = initial;
  }

  async start(): Promise<void> {}

  async stop(): Promise<void> {}

  async locate(locator: Locator): Promise<LocateResult> {
    const [element] = matchLocator(this.current, locator);
    return element ? { found: true, element } : { found: false, reason: 'not on screen' };
  }

  async click(element: ElementHandle): Promise<boolean> {
    this.clicked.push(element);
    this.onClick?.(element);
    return true;
  }

  async textOf(element: ElementHandle): Promise<string | null> {
    return element.text;
  }

  async treeDump(): Promise<string> {
    return this.treeText;
  }

  async hierarchy(): Promise<ParsedHierarchy> {
    this.hierarchyCalls += 1;
    const next = this.script.length > 1 ? this.script.shift() : this.script[0];
    if (next instanceof Error) throw next;
    if (next) this.current = next;
    return this.current;
  }

  async screenshot(filePath: string): Promise<boolean> {
    this.screenshots.push(filePath);
    return true;
  }

  async tap(): Promise<boolean> {
    return true;
  }

  async navigateBack(): Promise<boolean> {
    this.backPresses += 1;
    this.onBack?.();
    return true;
  }

  async windowSize(): Promise<Size | null> {
    return this.size;
  }
}

export class FakeDeviceControl implements DeviceControl {
  readonly taps: Array<{ x: number; y: number }> = [];
  readonly pushed: Array<[string, string]> = [];
  readonly launched: AppTarget[] = [];
  readonly viewed: string[] = [];
  foreground: string | null;
  pushSucceeds = true;
  viewSucceeds = true;
  onTap?: (x: number, y: number) => void;

  constructor(foreground: string | null = null) {
    this.foreground = foreground;
  }

  async pushFile(localPath: string, devicePath: string): Promise<boolean> {
    this.pushed.push([localPath, devicePath]);
    return this.pushSucceeds;
  }

  async launch(target: AppTarget): Promise<boolean> {
    this.launched.push(target);
    this.foreground = target.packageName;
    return true;
  }

  async foregroundApp(): Promise<string | null> {
    return this.foreground;
  }

  async rawTap(x: number, y: number): Promise<boolean> {
    this.taps.push({ x, y });
    this.onTap?.(x, y);
    return true;
  }

  async viewImage(_target: AppTarget, devicePath: string): Promise<boolean> {
    this.viewed.push(devicePath);
    return this.viewSucceeds;
  }
}
