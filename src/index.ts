export { Transform, createECSWorld, setPosition } from './ecs/world';
export { Camera2D, addCamera2D, type Camera2DOptions } from './ecs/components/camera';
export {
  createCameraFollowSystem,
  type CameraFollowControls,
  type CameraFollowOptions,
} from './ecs/systems/cameraFollowSystem';
export {
  CameraConfigError,
  DEFAULT_CAMERA_FOLLOW_CONFIG,
  resolveCameraFollowConfig,
  validateCameraFollowConfig,
  type CameraFollowConfig,
  type CameraFollowConfigPatch,
  type ConfigIssue,
} from './ecs/systems/cameraFollowConfig';
export {
  Object3DRef,
  addObject3DToEntity,
  createViewSystem,
  object3DMap,
  removeObject3DFromEntity,
} from './ecs/systems/viewSystem';
export { createFixedStep, type FixedStepOptions, type FixedStepper } from './time/fixedStep';
export { clamp01, clampToBounds, followWeight, snapScalar, snapToPixelGrid } from './utils/pixelGrid';
export type { Bounds, FollowState, Vec2 } from './shared/types';
