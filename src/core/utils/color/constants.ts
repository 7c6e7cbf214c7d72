/**
 * Color Constants
 * Anchor colors for the built-in default ramps
 */

// ============================================================================
// Default Diverging Ramps
// ============================================================================

/**
 * Tableau-style orange -> blue diverging ramp
 */
export const ORANGE_BLUE_DIVERGING = [
  "#9E3D22",
  "#D45B21",
  "#F69035",
  "#D9D5C9",
  "#77ACD3",
  "#4F81AF",
  "#2B5C8A",
] as const;

/**
 * Earth -> emerald diverging ramp, muted in the manner of report graphics
 */
export const EARTH_EMERALD_DIVERGING = [
  "#7F5A2E",
  "#A8875A",
  "#CDB98F",
  "#EEEBE0",
  "#9CCFB4",
  "#4FA07C",
  "#1D7F5A",
] as const;

// ============================================================================
// Preview Colors
// ============================================================================

export const PREVIEW_COLORS = {
  background: "#BFBFBF",
  label: "#1A1A1A",
} as const;
