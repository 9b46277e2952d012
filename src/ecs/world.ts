import { createWorld, defineComponent, Types } from 'bitecs';
import type { IWorld } from 'bitecs';

// World-space position of anything the camera can see or follow.
// f32 is plenty for entity positions; the follower keeps its own f64 state.
export const Transform = defineComponent({
  position: {
    x: Types.f32,
    y: Types.f32,
  },
});

// ECS World Factory function
export const createECSWorld = (): IWorld => createWorld();

export const setPosition = (eid: number, x: number, y: number): void => {
  Transform.position.x[eid] = x;
  Transform.position.y[eid] = y;
};
