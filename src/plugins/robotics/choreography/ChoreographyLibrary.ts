// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Choreography Library
// Named multi-channel motion sequences with priority and interruption policy
// ═══════════════════════════════════════════════════════════════════════════════

import builtInChoreographies from './data/choreographies.json';
import { AudioCue, Choreography, ChoreographyStep, createStep } from './ChoreographyTypes';
import { buildTimeline } from './timeline';
import { resolveEasingName } from '../motion/easing';
import { MAX_CHANNELS } from '../ServoTypes';

export interface ChoreographyInfo {
  name: string;
  description: string;
  personality: string;
  priority: number;
  allowsInterruption: boolean;
  emotionalIntensity: number;
  durationMs: number;
  emergencyStopTimeMs: number;
  stepCount: number;
  channels: number[];
  audioCues: number;
}

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export function checkChoreography(choreography: Choreography): string[] {
  const errors: string[] = [];
  const label = choreography.name || '(unnamed)';

  if (choreography.name.trim() === '') errors.push('name is required');
  if (!Number.isInteger(choreography.priority) || choreography.priority < 1 || choreography.priority > 10) {
    errors.push(`${label}: priority must be an integer 1-10`);
  }
  if (!(choreography.emotionalIntensity >= 0)) errors.push(`${label}: emotionalIntensity must be >= 0`);
  if (!(choreography.emergencyStopTimeMs >= 0)) errors.push(`${label}: emergencyStopTimeMs must be >= 0`);
  if (choreography.steps.length === 0) errors.push(`${label}: at least one step is required`);

  choreography.steps.forEach((step, index) => {
    const at = `${label} step ${index}`;
    if (!Number.isInteger(step.channel) || step.channel < 0 || step.channel >= MAX_CHANNELS) {
      errors.push(`${at}: invalid channel ${step.channel}`);
    }
    if (!Number.isFinite(step.end)) errors.push(`${at}: end must be a finite number`);
    if (!(step.durationMs >= 0)) errors.push(`${at}: durationMs must be >= 0`);
    if (!(step.delayMs >= 0)) errors.push(`${at}: delayMs must be >= 0`);
    if (!(step.holdMs >= 0)) errors.push(`${at}: holdMs must be >= 0`);
    if (!(step.overshootFactor >= 0)) errors.push(`${at}: overshootFactor must be >= 0`);
    if (!(step.syncOffsetMs >= 0)) errors.push(`${at}: syncOffsetMs must be >= 0`);
    if (!(step.personalityModifier > 0)) errors.push(`${at}: personalityModifier must be > 0`);
    if (!resolveEasingName(step.easing)) errors.push(`${at}: unknown easing ${step.easing}`);
  });

  choreography.audioCues.forEach((cue, index) => {
    if (!(cue.atMs >= 0) || cue.cue === '') errors.push(`${label} audio cue ${index}: invalid`);
  });

  return errors;
}

function optionalNumber(fields: Fields, key: string): number | undefined {
  const value = fields[key];
  return typeof value === 'number' ? value : undefined;
}

function parseStep(value: unknown, errors: string[], at: string): ChoreographyStep | undefined {
  if (!isFields(value)) {
    errors.push(`${at}: not an object`);
    return undefined;
  }

  const channel = optionalNumber(value, 'channel');
  const end = optionalNumber(value, 'end');
  const durationMs = optionalNumber(value, 'durationMs');
  if (channel === undefined || end === undefined || durationMs === undefined) {
    errors.push(`${at}: channel, end and durationMs are required`);
    return undefined;
  }

  return createStep({
    channel,
    end,
    durationMs,
    start: optionalNumber(value, 'start'),
    easing: typeof value.easing === 'string' ? value.easing : 'linear',
    delayMs: optionalNumber(value, 'delayMs') ?? 0,
    holdMs: optionalNumber(value, 'holdMs') ?? 0,
    overshootFactor: optionalNumber(value, 'overshootFactor') ?? 0,
    syncGroup: typeof value.syncGroup === 'string' ? value.syncGroup : undefined,
    syncOffsetMs: optionalNumber(value, 'syncOffsetMs') ?? 0,
    personalityModifier: optionalNumber(value, 'personalityModifier') ?? 1,
  });
}

/** Read a choreography from JSON data. Throws on malformed input. */
export function parseChoreography(value: unknown): Choreography {
  const errors: string[] = [];
  if (!isFields(value) || typeof value.name !== 'string') {
    throw new Error('Choreography must be an object with a name');
  }

  const steps: ChoreographyStep[] = [];
  const rawSteps = Array.isArray(value.steps) ? value.steps : [];
  rawSteps.forEach((raw, index) => {
    const step = parseStep(raw, errors, `${value.name} step ${index}`);
    if (step) steps.push(step);
  });

  const audioCues: AudioCue[] = [];
  for (const raw of Array.isArray(value.audioCues) ? value.audioCues : []) {
    if (isFields(raw) && typeof raw.atMs === 'number' && typeof raw.cue === 'string') {
      audioCues.push({ atMs: raw.atMs, cue: raw.cue });
    } else {
      errors.push(`${value.name}: malformed audio cue`);
    }
  }

  const choreography: Choreography = {
    name: value.name,
    description: typeof value.description === 'string' ? value.description : '',
    personality: typeof value.personality === 'string' ? value.personality : 'neutral',
    steps,
    priority: optionalNumber(value, 'priority') ?? 5,
    allowsInterruption: typeof value.allowsInterruption === 'boolean' ? value.allowsInterruption : true,
    emotionalIntensity: optionalNumber(value, 'emotionalIntensity') ?? 1,
    totalDurationMs: optionalNumber(value, 'totalDurationMs'),
    emergencyStopTimeMs: optionalNumber(value, 'emergencyStopTimeMs') ?? 500,
    audioCues,
  };

  errors.push(...checkChoreography(choreography));
  if (errors.length > 0) {
    throw new Error(`Invalid choreography ${value.name}: ${errors.join('; ')}`);
  }

  return choreography;
}

function copyChoreography(choreography: Choreography): Choreography {
  return {
    ...choreography,
    steps: choreography.steps.map(step => ({ ...step })),
    audioCues: choreography.audioCues.map(cue => ({ ...cue })),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Library
// ─────────────────────────────────────────────────────────────────────────────

export class ChoreographyLibrary {
  private choreographies: Map<string, Choreography> = new Map();

  constructor(entries: Choreography[] = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  static withBuiltIns(): ChoreographyLibrary {
    const raw: unknown[] = builtInChoreographies;
    return new ChoreographyLibrary(raw.map(parseChoreography));
  }

  add(choreography: Choreography): void {
    const errors = checkChoreography(choreography);
    if (errors.length > 0) {
      throw new Error(`Invalid choreography ${choreography.name}: ${errors.join('; ')}`);
    }
    this.choreographies.set(choreography.name, copyChoreography(choreography));
  }

  get(name: string): Choreography | undefined {
    const choreography = this.choreographies.get(name);
    return choreography ? copyChoreography(choreography) : undefined;
  }

  has(name: string): boolean {
    return this.choreographies.has(name);
  }

  list(personality?: string): string[] {
    return Array.from(this.choreographies.values())
      .filter(c => personality === undefined || c.personality === personality)
      .map(c => c.name)
      .sort();
  }

  info(name: string): ChoreographyInfo | undefined {
    const choreography = this.choreographies.get(name);
    if (!choreography) return undefined;

    const timeline = buildTimeline(choreography.steps);
    return {
      name: choreography.name,
      description: choreography.description,
      personality: choreography.personality,
      priority: choreography.priority,
      allowsInterruption: choreography.allowsInterruption,
      emotionalIntensity: choreography.emotionalIntensity,
      durationMs: Math.max(timeline.durationMs, choreography.totalDurationMs ?? 0),
      emergencyStopTimeMs: choreography.emergencyStopTimeMs,
      stepCount: choreography.steps.length,
      channels: [...new Set(choreography.steps.map(s => s.channel))].sort((a, b) => a - b),
      audioCues: choreography.audioCues.length,
    };
  }

  size(): number {
    return this.choreographies.size;
  }
}
