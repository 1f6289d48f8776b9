// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Robotics Module
// Registry, safety, interpolation, choreography, queueing and profiles
// ═══════════════════════════════════════════════════════════════════════════════

export * from './ServoTypes';

export { ActuatorRegistry, checkConfig, isValidChannel } from './ActuatorRegistry';
export type { RegistryResult } from './ActuatorRegistry';

export { SafetyValidator, clamp } from './SafetyValidator';
export type {
  RejectionReason,
  ValidationResult,
  ValidateOptions,
  SafetyValidatorOptions,
  ResetResult,
  PositionRange,
  SafetyStatus,
} from './SafetyValidator';

export {
  getEasing,
  isEasingName,
  resolveEasingName,
  EASING_ALIASES,
  EASING_NAMES,
} from './motion/easing';
export type { EasingFunction, EasingName, EasingAlias } from './motion/easing';

export { position, clampToRange, sampleTrajectory, OVERSHOOT_WINDOW } from './motion/MotionInterpolator';
export type { TrajectoryPoint } from './motion/MotionInterpolator';

export { createStep } from './choreography/ChoreographyTypes';
export type { Choreography, ChoreographyStep, AudioCue, StepInput } from './choreography/ChoreographyTypes';

export { buildTimeline, effectiveDuration } from './choreography/timeline';
export type { Timeline, TimelineEntry } from './choreography/timeline';

export { ChoreographyLibrary, checkChoreography, parseChoreography } from './choreography/ChoreographyLibrary';
export type { ChoreographyInfo } from './choreography/ChoreographyLibrary';

export { ChoreographyEngine } from './choreography/ChoreographyEngine';
export type {
  ChoreographyEngineOptions,
  EngineHooks,
  EngineStatus,
  ExecuteOptions,
  ExecuteResult,
  RunKind,
  RunState,
  RunStatus,
} from './choreography/ChoreographyEngine';

export { CommandQueue } from './CommandQueue';
export type {
  CommandInput,
  CommandQueueOptions,
  QueueItemInfo,
  QueueItemStatus,
  QueueStats,
  QueueStatusResult,
  SequenceInput,
  SubmitResult,
} from './CommandQueue';

export { ProfileStore, isValidProfileName } from './profiles/ProfileStore';
export type { LoadResult, ProfileSummary, SaveResult } from './profiles/ProfileStore';

export { PROFILE_VERSION, fromDocument, toDocument, toServoDocument, validateDocument } from './profiles/ProfileDocument';
export type { ParsedProfile, ProfileDocument, ServoDocument, LimitsDocument } from './profiles/ProfileDocument';

export { createDefaultConfigs, DEFAULT_PROFILE_NAME } from './profiles/defaults';
