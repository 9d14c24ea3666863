/**
 * Ligature switches for the deterministic shaper.
 *
 * A global flag plus per-family overrides; overrides are matched on the run's
 * primary family name, case-insensitively.
 */
export type LigatureConfig = {
  readonly enabled: boolean;
  readonly fontOverrides: Readonly<Record<string, boolean>>;
  /** Character sequences merged into a single glyph when ligatures apply. */
  readonly sequences: readonly string[];
};

export const DEFAULT_LIGATURE_SEQUENCES: readonly string[] = ['ffi', 'ffl', 'ff', 'fi', 'fl', '->', '=>', '!=', '=='];

// Families with full programming-ligature tables.
const LIGATURE_FONTS = [
  'Fira Code',
  'FiraCode',
  'FiraCode Nerd Font',
  'JetBrains Mono',
  'JetBrainsMono',
  'Cascadia Code',
  'CascadiaCode',
  'Iosevka',
  'Iosevka Term',
  'Victor Mono',
  'VictorMono',
];

const NO_LIGATURE_FONTS = ['Monaco', 'Consolas', 'Menlo', 'Courier', 'Courier New', 'Ubuntu Mono', 'Liberation Mono'];

export const DEFAULT_LIGATURE_CONFIG: LigatureConfig = {
  enabled: false,
  fontOverrides: {},
  sequences: DEFAULT_LIGATURE_SEQUENCES,
};

/** Ligatures off globally, on for programming fonts known to ship them, off for the classic monospace set. */
export function programmingLigatureDefaults(): LigatureConfig {
  const fontOverrides: Record<string, boolean> = {};
  for (const font of LIGATURE_FONTS) fontOverrides[font] = true;
  for (const font of NO_LIGATURE_FONTS) fontOverrides[font] = false;
  return { enabled: false, fontOverrides, sequences: DEFAULT_LIGATURE_SEQUENCES };
}

export function isLigatureEnabledForFont(config: LigatureConfig, fontFamily: string | undefined): boolean {
  if (!fontFamily) return config.enabled;
  const wanted = fontFamily.trim().toLowerCase();
  for (const [name, enabled] of Object.entries(config.fontOverrides)) {
    if (name.toLowerCase() === wanted) return enabled;
  }
  return config.enabled;
}

export function withFontOverride(config: LigatureConfig, fontFamily: string, enabled: boolean): LigatureConfig {
  return { ...config, fontOverrides: { ...config.fontOverrides, [fontFamily]: enabled } };
}
