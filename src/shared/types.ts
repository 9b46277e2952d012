export interface Vec2 {
  x: number;
  y: number;
}

// Screen-space convention: y grows downward, so top < bottom.
export interface Bounds {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export type FollowState = 'idle' | 'following';
