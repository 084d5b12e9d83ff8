/**
 * App profile: everything the sequencer knows about the target app's screens
 * (labels, markers, known coordinates, keyword lists).
 */

import fs from 'fs-extra';
import { z } from 'zod';
import { ValidationError, errorMessage, type Point, type Size } from '@scanprobe/shared';
import type { Locator } from '@scanprobe/device';
import insectIdentifierProfile from '../profiles/insect-identifier.json' with { type: 'json' };

// =============================================================================
// Schema
// =============================================================================

export const LocatorSchema = z.object({
  strategy: z.enum([
    'text',
    'textContains',
    'accessibilityId',
    'descriptionContains',
    'resourceIdContains',
    'className',
  ]),
  value: z.string().min(1),
  className: z.string().optional(),
  index: z.number().int().positive().optional(),
}) satisfies z.ZodType<Locator>;

const PointSchema = z.object({ x: z.number().int(), y: z.number().int() });

/** A tap target relative to the current window */
export const ScreenPositionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fraction'), x: z.number().min(0).max(1), y: z.number().min(0).max(1) }),
  z.object({ kind: z.literal('topRight'), inset: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('bottomCenter'), inset: z.number().int().nonnegative() }),
]);

const locators = z.array(LocatorSchema).min(1);
const markers = z.array(z.string().min(1)).min(1);

export const AppProfileSchema = z.object({
  app: z.object({
    name: z.string().min(1),
    packageName: z.string().min(1),
    activity: z.string().min(1),
  }),
  onboarding: z.object({
    skipButton: PointSchema,
    /** Present while the onboarding screen is shown */
    marker: LocatorSchema,
    getStartedLocators: locators,
    getStartedPoint: PointSchema,
    retapCount: z.number().int().positive(),
    /** All present means an intent bounced the app back to onboarding */
    resetMarkers: markers,
    notificationAllowLocators: locators,
    notificationRounds: z.number().int().positive(),
  }),
  permissions: z.object({
    buttons: locators,
  }),
  gallery: z.object({
    locators,
    fallbackPositions: z.array(ScreenPositionSchema),
    pickerMarkers: markers,
    debugDumpFile: z.string().min(1),
  }),
  imageSelection: z.object({
    deviceDirectory: z.string().min(1),
    folderLocators: locators,
    imageClassName: z.string().min(1),
    fallbackImageCount: z.number().int().nonnegative(),
  }),
  scan: z.object({
    busyIndicators: markers,
    stillScanningIndicators: markers,
    resultMarkers: markers,
    /** Extra markers accepted while waiting for a manual selection */
    manualResultMarkers: z.array(z.string().min(1)).default([]),
  }),
  advertisement: z.object({
    indicators: markers,
    closeLocators: locators,
    closePositions: z.array(ScreenPositionSchema),
  }),
  extraction: z.object({
    noInsectPhrases: markers,
    /** Case-insensitive regular expression for the target species */
    speciesPattern: z.string().min(1),
    canonicalSpecies: z.string().min(1),
    uiChrome: z.array(z.string()),
    minFragmentLength: z.number().int().nonnegative(),
    targetedLocators: z.array(LocatorSchema),
  }),
  reset: z.object({
    locators,
    identifyLocators: locators,
    backLocators: z.array(LocatorSchema),
  }),
});

export type AppProfile = z.infer<typeof AppProfileSchema>;
export type ScreenPosition = z.infer<typeof ScreenPositionSchema>;

// =============================================================================
// Loading
// =============================================================================

export function parseProfile(raw: unknown, source = 'profile'): AppProfile {
  const result = AppProfileSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid app profile in ${source}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  try {
    new RegExp(result.data.extraction.speciesPattern, 'i');
  } catch (error) {
    throw new ValidationError(`Invalid species pattern in ${source}: ${errorMessage(error)}`);
  }
  return result.data;
}

/**
 * Read and validate a profile file, or the bundled insect identifier profile
 * without one.
 */
export function loadProfile(filePath?: string): AppProfile {
  if (!filePath) {
    return parseProfile(insectIdentifierProfile, 'bundled insect identifier profile');
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(filePath);
  } catch (error) {
    throw new ValidationError(`Could not read app profile from ${filePath}`, {
      cause: errorMessage(error),
    });
  }
  return parseProfile(raw, filePath);
}

/**
 * Absolute pixel for a window-relative position.
 */
export function resolvePosition(position: ScreenPosition, size: Size): Point {
  switch (position.kind) {
    case 'fraction':
      return { x: Math.floor(size.width * position.x), y: Math.floor(size.height * position.y) };
    case 'topRight':
      return { x: size.width - position.inset, y: position.inset };
    case 'bottomCenter':
      return { x: Math.floor(size.width / 2), y: size.height - position.inset };
  }
}
