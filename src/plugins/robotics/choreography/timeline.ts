// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Timeline
// Places choreography steps on a shared clock relative to sequence start
// ═══════════════════════════════════════════════════════════════════════════════

import { ChoreographyStep } from './ChoreographyTypes';

export interface TimelineEntry {
  index: number;                // Position in the authored step list
  step: ChoreographyStep;
  startMs: number;
  durationMs: number;           // Paced and sync-aligned
  endMs: number;
  holdEndMs: number;
}

export interface Timeline {
  entries: TimelineEntry[];     // Ordered by start time, then authoring order
  durationMs: number;
}

/**
 * Real time a step takes once its own personality modifier and the run-wide
 * one are applied. A modifier above 1 plays the move faster.
 */
export function effectiveDuration(step: ChoreographyStep, runModifier = 1): number {
  return step.durationMs / (step.personalityModifier * runModifier);
}

/**
 * Each step occupies [delay, delay + duration] plus its hold, with duration
 * already paced by the modifiers. Steps sharing a sync group end together at
 * the group's latest paced end; a sync offset pushes a member's start later
 * and shortens it so the end still lines up.
 */
export function buildTimeline(steps: ChoreographyStep[], runModifier = 1): Timeline {
  const paced = steps.map(step => effectiveDuration(step, runModifier));

  const groupEnds = new Map<string, number>();
  steps.forEach((step, index) => {
    if (step.syncGroup === undefined) return;
    const end = step.delayMs + paced[index];
    groupEnds.set(step.syncGroup, Math.max(groupEnds.get(step.syncGroup) ?? 0, end));
  });

  const entries = steps.map((step, index): TimelineEntry => {
    const groupEnd = step.syncGroup === undefined ? undefined : groupEnds.get(step.syncGroup);

    let startMs = step.delayMs;
    let durationMs = paced[index];
    if (groupEnd !== undefined) {
      durationMs = Math.max(0, paced[index] - step.syncOffsetMs);
      startMs = groupEnd - durationMs;
    }

    const endMs = startMs + durationMs;
    return { index, step, startMs, durationMs, endMs, holdEndMs: endMs + step.holdMs };
  });

  entries.sort((a, b) => a.startMs - b.startMs || a.index - b.index);

  return {
    entries,
    durationMs: entries.reduce((max, entry) => Math.max(max, entry.holdEndMs), 0),
  };
}
