// ============================================
// Shared Types & Constants
// Used by the simulation and by any host embedding it
// ============================================

// ECS Module - Entity Component System container and component shapes
export * from './ecs';

// Math utilities - bounds and overlap geometry
export * from './math';

// Game constants (GAME_CONFIG)
export * from './constants';

// Type definitions (Faction, GameState, WindowSize, ...)
export * from './types';
