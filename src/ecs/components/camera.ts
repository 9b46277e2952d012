import { addComponent, defineComponent, Types } from 'bitecs';
import type { IWorld } from 'bitecs';
import { HOST_SMOOTHING_SPEED } from '../../shared/constants';

// Host-side 2D camera. The host can smooth the camera on its own
// (smoothingEnabled); the follow system turns that off when it takes over.
export const Camera2D = defineComponent({
  zoom: Types.f32,
  // 0 = off, 1 = host lerps the rendered camera toward Transform
  smoothingEnabled: Types.ui8,
  // Lerp rate per second for the host smoothing
  smoothingSpeed: Types.f32,
});

export interface Camera2DOptions {
  zoom?: number;
  smoothingEnabled?: boolean;
  smoothingSpeed?: number;
}

export const addCamera2D = (world: IWorld, eid: number, options: Camera2DOptions = {}): void => {
  addComponent(world, Camera2D, eid);
  Camera2D.zoom[eid] = options.zoom ?? 1;
  Camera2D.smoothingEnabled[eid] = options.smoothingEnabled ? 1 : 0;
  Camera2D.smoothingSpeed[eid] = options.smoothingSpeed ?? HOST_SMOOTHING_SPEED;
};
