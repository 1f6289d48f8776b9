// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Choreography Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChoreographyStep {
  channel: number;
  start?: number;               // Nominal origin; runs start from the live position
  end: number;
  durationMs: number;
  easing: string;
  delayMs: number;              // Relative to sequence start
  holdMs: number;               // Channel stays claimed after arriving
  overshootFactor: number;
  syncGroup?: string;           // Steps in a group share an end time
  syncOffsetMs: number;         // Staggers the start within the group
  personalityModifier: number;  // Pace multiplier, >1 is faster
}

export interface AudioCue {
  atMs: number;
  cue: string;
}

export interface Choreography {
  name: string;
  description: string;
  personality: string;
  steps: ChoreographyStep[];
  priority: number;             // 1-10
  allowsInterruption: boolean;
  emotionalIntensity: number;   // Scales overshoot
  totalDurationMs?: number;
  emergencyStopTimeMs: number;  // Advisory
  audioCues: AudioCue[];
}

export type StepInput = Pick<ChoreographyStep, 'channel' | 'end' | 'durationMs'> & Partial<ChoreographyStep>;

export function createStep(input: StepInput): ChoreographyStep {
  return {
    easing: 'linear',
    delayMs: 0,
    holdMs: 0,
    overshootFactor: 0,
    syncOffsetMs: 0,
    personalityModifier: 1,
    ...input,
  };
}
