// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Easing Functions
// Normalized time -> normalized progress; every curve maps 0 -> 0 and 1 -> 1
// ═══════════════════════════════════════════════════════════════════════════════

export type EasingFunction = (t: number) => number;

const BACK_C1 = 1.70158;
const BACK_C2 = BACK_C1 * 1.525;
const BACK_C3 = BACK_C1 + 1;
const ELASTIC_C4 = (2 * Math.PI) / 3;
const ELASTIC_C5 = (2 * Math.PI) / 4.5;
const BOUNCE_N = 7.5625;
const BOUNCE_D = 2.75;

function bounceOut(t: number): number {
  if (t < 1 / BOUNCE_D) {
    return BOUNCE_N * t * t;
  }
  if (t < 2 / BOUNCE_D) {
    const u = t - 1.5 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.75;
  }
  if (t < 2.5 / BOUNCE_D) {
    const u = t - 2.25 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.9375;
  }
  const u = t - 2.625 / BOUNCE_D;
  return BOUNCE_N * u * u + 0.984375;
}

const CURVES = {
  linear: (t: number) => t,

  // Quadratic
  ease_in: (t: number) => t * t,
  ease_out: (t: number) => 1 - (1 - t) * (1 - t),
  ease_in_out: (t: number) => (t < 0.5 ? 2 * t * t : 1 - 2 * (1 - t) * (1 - t)),

  cubic_in: (t: number) => t ** 3,
  cubic_out: (t: number) => 1 - (1 - t) ** 3,
  cubic_in_out: (t: number) => (t < 0.5 ? 4 * t ** 3 : 1 - (-2 * t + 2) ** 3 / 2),

  quart_in: (t: number) => t ** 4,
  quart_out: (t: number) => 1 - (1 - t) ** 4,
  quart_in_out: (t: number) => (t < 0.5 ? 8 * t ** 4 : 1 - (-2 * t + 2) ** 4 / 2),

  quint_in: (t: number) => t ** 5,
  quint_out: (t: number) => 1 - (1 - t) ** 5,
  quint_in_out: (t: number) => (t < 0.5 ? 16 * t ** 5 : 1 - (-2 * t + 2) ** 5 / 2),

  sine_in: (t: number) => 1 - Math.cos((t * Math.PI) / 2),
  sine_out: (t: number) => Math.sin((t * Math.PI) / 2),
  sine_in_out: (t: number) => -(Math.cos(Math.PI * t) - 1) / 2,

  expo_in: (t: number) => 2 ** (10 * t - 10),
  expo_out: (t: number) => 1 - 2 ** (-10 * t),
  expo_in_out: (t: number) => (t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2),

  circ_in: (t: number) => 1 - Math.sqrt(1 - t * t),
  circ_out: (t: number) => Math.sqrt(1 - (t - 1) ** 2),
  circ_in_out: (t: number) =>
    t < 0.5
      ? (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2
      : (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2,

  // Dips below 0 (in) or rises above 1 (out) before settling
  back_in: (t: number) => BACK_C3 * t ** 3 - BACK_C1 * t * t,
  back_out: (t: number) => 1 + BACK_C3 * (t - 1) ** 3 + BACK_C1 * (t - 1) ** 2,
  back_in_out: (t: number) =>
    t < 0.5
      ? ((2 * t) ** 2 * ((BACK_C2 + 1) * 2 * t - BACK_C2)) / 2
      : ((2 * t - 2) ** 2 * ((BACK_C2 + 1) * (t * 2 - 2) + BACK_C2) + 2) / 2,

  elastic_in: (t: number) => -(2 ** (10 * t - 10)) * Math.sin((t * 10 - 10.75) * ELASTIC_C4),
  elastic_out: (t: number) => 2 ** (-10 * t) * Math.sin((t * 10 - 0.75) * ELASTIC_C4) + 1,
  elastic_in_out: (t: number) =>
    t < 0.5
      ? -(2 ** (20 * t - 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2
      : (2 ** (-20 * t + 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2 + 1,

  bounce_in: (t: number) => 1 - bounceOut(1 - t),
  bounce_out: bounceOut,
  bounce_in_out: (t: number) => (t < 0.5 ? (1 - bounceOut(1 - 2 * t)) / 2 : (1 + bounceOut(2 * t - 1)) / 2),

  // Character curves
  organic: (t: number) => t + 0.1 * Math.sin(4 * Math.PI * t) * (1 - t),
  mechanical: (t: number) => t * t * (3 - 2 * t),
  emotional: (t: number) => t + 0.15 * Math.sin(2 * Math.PI * t) * t * (1 - t),
} satisfies Record<string, EasingFunction>;

export type EasingName = keyof typeof CURVES;

export const EASING_ALIASES = {
  cubic: 'cubic_in',
  quart: 'quart_in',
  quint: 'quint_in',
  sine: 'sine_in',
  expo: 'expo_in',
  circ: 'circ_in',
  back: 'back_in',
  elastic: 'elastic_in',
  bounce: 'bounce_out',
} satisfies Record<string, EasingName>;

export type EasingAlias = keyof typeof EASING_ALIASES;

export const EASING_NAMES = Object.keys(CURVES).filter(isEasingName);

export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(CURVES, name);
}

function isEasingAlias(name: string): name is EasingAlias {
  return Object.prototype.hasOwnProperty.call(EASING_ALIASES, name);
}

/** Canonical curve name for a name or alias, or undefined if unknown. */
export function resolveEasingName(name: string): EasingName | undefined {
  if (isEasingName(name)) return name;
  if (isEasingAlias(name)) return EASING_ALIASES[name];
  return undefined;
}

/**
 * Easing curve by name. Unknown names fall back to linear. Input is clamped
 * to [0, 1] and the endpoints are returned exactly.
 */
export function getEasing(name: string): EasingFunction {
  const curve = CURVES[resolveEasingName(name) ?? 'linear'];
  return (t: number) => {
    if (!(t > 0)) return 0;
    if (t >= 1) return 1;
    return curve(t);
  };
}
