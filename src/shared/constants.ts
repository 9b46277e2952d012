// Follow camera defaults. Units are world units unless noted.
export const DEFAULT_FOLLOW_SPEED = 5.0; // per second; higher catches up faster
export const DEFAULT_PIXEL_SIZE = 1.0; // world units per screen pixel

export const PIXEL_SIZE_MAX = 64;
export const FOLLOW_SPEED_SOFT_MAX = 30; // above this smoothing is barely visible

// Effectively unbounded until a level sets real limits
export const DEFAULT_LIMIT = 10_000_000;

// Host camera's own smoothing, switched off by the follower on initialize
export const HOST_SMOOTHING_SPEED = 5.0;

export const FIXED_HZ = 60;
export const MAX_FRAME_DELTA_S = 0.25; // caps the catch-up after a hitch
