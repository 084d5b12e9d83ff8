import { describe, expect, it } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ValidationError } from '@scanprobe/shared';
import { loadProfile, parseProfile, resolvePosition } from './profile.js';

describe('loadProfile', () => {
  it('loads the bundled insect identifier profile', () => {
    const profile = loadProfile();

    expect(profile.app.packageName).toBe('com.janogroupllc.pdfphotos');
    expect(profile.onboarding.getStartedPoint).toEqual({ x: 540, y: 2148 });
    expect(profile.scan.manualResultMarkers).toEqual(['No Insect']);
  });

  it('reports a missing file as a validation error', () => {
    const missing = path.join(os.tmpdir(), 'scanprobe-no-such-profile.json');
    expect(() => loadProfile(missing)).toThrow(`Could not read app profile from ${missing}`);
  });

  it('reads a profile from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanprobe-profile-'));
    const file = path.join(dir, 'profile.json');
    const bundled = loadProfile();
    await fs.writeJson(file, { ...bundled, app: { ...bundled.app, name: 'Other App' } });

    expect(loadProfile(file).app.name).toBe('Other App');
    await fs.remove(dir);
  });
});

describe('parseProfile', () => {
  it('lists the invalid fields', () => {
    const bundled = loadProfile();
    const raw = { ...bundled, gallery: { ...bundled.gallery, locators: [] } };

    try {
      parseProfile(raw, 'broken.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid app profile in broken.json');
        expect(error.details?.issues).toEqual(['gallery.locators: Array must contain at least 1 element(s)']);
      }
    }
  });

  it('rejects a species pattern that is not a regular expression', () => {
    const bundled = loadProfile();
    const raw = { ...bundled, extraction: { ...bundled.extraction, speciesPattern: 'dragon(' } };

    expect(() => parseProfile(raw)).toThrow(/^Invalid species pattern in profile: /);
  });
});

describe('resolvePosition', () => {
  const size = { width: 1080, height: 2400 };

  it('scales fractions and floors them', () => {
    expect(resolvePosition({ kind: 'fraction', x: 0.5, y: 0.55 }, size)).toEqual({ x: 540, y: 1320 });
  });

  it('insets from the top-right corner', () => {
    expect(resolvePosition({ kind: 'topRight', inset: 150 }, size)).toEqual({ x: 930, y: 150 });
  });

  it('insets from the bottom edge at the horizontal centre', () => {
    expect(resolvePosition({ kind: 'bottomCenter', inset: 100 }, { width: 1081, height: 2400 })).toEqual({
      x: 540,
      y: 2300,
    });
  });
});
