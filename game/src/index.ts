// ============================================
// Starfall collision core - public API
// ============================================

export { Game, type GameOptions } from './Game';
export { GameStateMachine, type GameStateController } from './GameStateMachine';
export { FrameClock } from './FrameClock';
export { triggerCue, silentAudio, type AudioTrigger } from './audio';
export { loadRuntimeConfig, loadLogConfig, type RuntimeConfig, type LogConfig } from './config';
export * from './ecs';
