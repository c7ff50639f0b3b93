import type { PageConfig, PageSizeName, PageSizePreset } from '../types.js';

/**
 * 720 × 960 card (3:4)
 */
export const smallPreset: PageSizePreset = {
  name: 'small',
  width: 720,
  height: 960,
  padding: {
    top: 35,
    bottom: 50,
    sides: 30,
  },
  headingKeepWithPx: 100,
  mergeThreshold: 0.35,
};

/**
 * 1080 × 1440 card (3:4)
 */
export const mediumPreset: PageSizePreset = {
  name: 'medium',
  width: 1080,
  height: 1440,
  padding: {
    top: 45,
    bottom: 70,
    sides: 40,
  },
  headingKeepWithPx: 150,
  mergeThreshold: 0.4,
};

/**
 * 1440 × 1920 card (3:4)
 */
export const largePreset: PageSizePreset = {
  name: 'large',
  width: 1440,
  height: 1920,
  padding: {
    top: 55,
    bottom: 90,
    sides: 50,
  },
  headingKeepWithPx: 200,
  mergeThreshold: 0.4,
};

/**
 * Registry of available page-size presets
 */
export const presets: Record<PageSizeName, PageSizePreset> = {
  small: smallPreset,
  medium: mediumPreset,
  large: largePreset,
};

/**
 * Preset used when none (or an unknown one) is specified
 */
export const defaultPreset: PageSizePreset = mediumPreset;

export function isPageSizeName(name: string): name is PageSizeName {
  return Object.prototype.hasOwnProperty.call(presets, name);
}

/**
 * Get a preset by name, falling back to the default for unknown names
 */
export function getPreset(name?: string): PageSizePreset {
  if (!name) {
    return defaultPreset;
  }

  const normalized = name.trim().toLowerCase();
  return isPageSizeName(normalized) ? presets[normalized] : defaultPreset;
}

/**
 * Get the content box dimensions (page minus padding)
 */
export function getContentBox(preset: PageSizePreset) {
  return {
    width: preset.width - preset.padding.sides * 2,
    height: preset.height - preset.padding.top - preset.padding.bottom,
    left: preset.padding.sides,
    top: preset.padding.top,
  };
}

export function resolvePageConfig(name?: string): PageConfig {
  const preset = getPreset(name);
  const box = getContentBox(preset);

  return {
    preset,
    contentWidth: box.width,
    contentHeight: box.height,
  };
}
