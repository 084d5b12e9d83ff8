/**
 * Maestro UI Hierarchy Parser
 *
 * Flattens the raw JSON from `maestro hierarchy` into numbered elements and
 * resolves locators against them.
 */

import type { Locator } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Raw Maestro TreeNode structure (from `maestro hierarchy` output)
 */
export interface MaestroTreeNode {
  attributes?: {
    bounds?: string; // "[x1,y1][x2,y2]" format
    text?: string;
    'resource-id'?: string;
    class?: string;
    'content-desc'?: string;
    accessibilityText?: string;
  };
  children?: MaestroTreeNode[];
}

/**
 * Parsed bounding box with calculated center point
 */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  width: number;
  height: number;
  centerX: number;
  centerY: number;
  area: number;
}

/**
 * One node of the screen, numbered in document order.
 */
export interface UIElement {
  id: number;
  className: string | null;
  text: string | null;
  resourceId: string | null;
  /** content-desc, or Maestro's accessibilityText */
  accessibilityLabel: string | null;
  bounds: BoundingBox | null;
}

export interface ParsedHierarchy {
  elementList: UIElement[];
  /** Inferred from the first node with a non-empty area */
  screenBounds: BoundingBox | null;
}

// =============================================================================
// Parser Functions
// =============================================================================

/**
 * Parse bounds string "[x1,y1][x2,y2]" into structured BoundingBox
 */
export function parseBounds(boundsStr: string | undefined): BoundingBox | null {
  if (!boundsStr) return null;

  const match = boundsStr.match(/\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]/);
  if (!match) return null;

  const [x1, y1, x2, y2] = match.slice(1, 5).map((part) => parseInt(part, 10));
  const width = x2 - x1;
  const height = y2 - y1;

  return {
    x1,
    y1,
    x2,
    y2,
    width,
    height,
    centerX: x1 + width / 2,
    centerY: y1 + height / 2,
    area: width * height,
  };
}

function cleanAttribute(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function collectElements(node: MaestroTreeNode, elements: UIElement[]): void {
  const attrs = node.attributes ?? {};
  elements.push({
    id: elements.length,
    className: cleanAttribute(attrs.class),
    text: cleanAttribute(attrs.text),
    resourceId: cleanAttribute(attrs['resource-id']),
    accessibilityLabel: cleanAttribute(attrs['content-desc']) ?? cleanAttribute(attrs.accessibilityText),
    bounds: parseBounds(attrs.bounds),
  });

  for (const child of node.children ?? []) {
    collectElements(child, elements);
  }
}

function isTreeNode(value: unknown): value is MaestroTreeNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten raw `maestro hierarchy` JSON. Anything that is not a tree node
 * yields an empty screen.
 */
export function parseHierarchy(rawHierarchy: unknown): ParsedHierarchy {
  const elementList: UIElement[] = [];
  if (isTreeNode(rawHierarchy)) {
    collectElements(rawHierarchy, elementList);
  }

  // Maestro wraps Android trees in an unbounded root
  const screenBounds =
    elementList.find((el) => el.bounds !== null && el.bounds.area > 0)?.bounds ?? null;

  return { elementList, screenBounds };
}

// =============================================================================
// Locators
// =============================================================================

function matchesStrategy(el: UIElement, locator: Locator): boolean {
  switch (locator.strategy) {
    case 'text':
      return el.text === locator.value;
    case 'textContains':
      return el.text?.includes(locator.value) ?? false;
    case 'accessibilityId':
      return el.accessibilityLabel === locator.value;
    case 'descriptionContains':
      return el.accessibilityLabel?.includes(locator.value) ?? false;
    case 'resourceIdContains':
      return el.resourceId?.includes(locator.value) ?? false;
    case 'className':
      return el.className === locator.value;
  }
}

/**
 * Elements matching a locator, in document order. With `index`, at most the
 * one element at that 1-based position.
 */
export function matchLocator(hierarchy: ParsedHierarchy, locator: Locator): UIElement[] {
  const matches = hierarchy.elementList.filter(
    (el) =>
      (locator.className === undefined || el.className === locator.className) &&
      matchesStrategy(el, locator)
  );

  if (locator.index === undefined) {
    return matches;
  }

  const picked = matches[locator.index - 1];
  return picked ? [picked] : [];
}

/**
 * Every visible text and every accessibility description, in document order.
 */
export function collectTextFragments(hierarchy: ParsedHierarchy): {
  texts: string[];
  descriptions: string[];
} {
  const texts: string[] = [];
  const descriptions: string[] = [];

  for (const el of hierarchy.elementList) {
    if (el.text) texts.push(el.text);
    if (el.accessibilityLabel) descriptions.push(el.accessibilityLabel);
  }

  return { texts, descriptions };
}

/**
 * True when any text or description on screen contains one of the needles
 * (case-sensitive substring, like matching against a page source dump).
 */
export function screenContains(hierarchy: ParsedHierarchy, needles: readonly string[]): boolean {
  const { texts, descriptions } = collectTextFragments(hierarchy);
  const fragments = [...texts, ...descriptions];
  return needles.some((needle) => fragments.some((fragment) => fragment.includes(needle)));
}

/**
 * Human-readable locator, used in logs and attempted-method lists.
 */
export function describeLocator(locator: Locator): string {
  const scope = locator.className ? `${locator.className}` : '*';
  const position = locator.index !== undefined ? `[${locator.index}]` : '';
  return `${locator.strategy}(${scope}: "${locator.value}")${position}`;
}
