export { EFFECT_PRESETS, LOOP_MODES, PLATFORMS, TOGGLE_EFFECTS } from './types';
export type {
  Platform,
  TrackDescriptor,
  LoopMode,
  EffectState,
  ToggleEffect,
  EffectPreset,
  FilterStageName,
  FilterStage,
  FilterGraphSpec,
  PipelineState,
  SessionStatus,
  QueueSnapshot,
  GuildSessionSnapshot,
  SessionCloseReason,
  EngineEventPayloads,
  EngineEventType,
  EngineEventBody,
  EngineEvent,
  CacheStats,
} from './types';
