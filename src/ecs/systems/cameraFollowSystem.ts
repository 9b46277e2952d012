import { addComponent, defineSystem, entityExists, hasComponent, type System } from 'bitecs';
import type { IWorld } from 'bitecs';
import * as THREE from 'three';
import { Transform } from '../world';
import { Camera2D } from '../components/camera';
import {
  resolveCameraFollowConfig,
  type CameraFollowConfig,
  type CameraFollowConfigPatch,
} from './cameraFollowConfig';
import { clampToBounds, followWeight, snapToPixelGrid } from '../../utils/pixelGrid';
import { FOLLOW_SPEED_SOFT_MAX } from '../../shared/constants';
import type { FollowState } from '../../shared/types';

export interface CameraFollowOptions {
  target?: number | null;
  config?: CameraFollowConfigPatch;
  // Per-tick tracing
  debug?: boolean;
}

export interface CameraFollowControls {
  system: System;
  initialize: () => void;
  tick: (deltaTime: number) => void;
  snapToTarget: () => void;
  setFollowTarget: (target: number | null, snapImmediately?: boolean) => void;
  configure: (patch: CameraFollowConfigPatch) => Readonly<CameraFollowConfig>;
  getConfig: () => Readonly<CameraFollowConfig>;
  getFollowTarget: () => number | null;
  getState: () => FollowState;
  getSmoothPosition: () => THREE.Vector2;
  getRenderedPosition: () => THREE.Vector2;
  cleanup: () => void;
}

/**
 * Pixel-art follow camera for the entity `cameraEid`.
 *
 * Keeps a sub-pixel `smoothPosition` that eases toward the target (plus offset)
 * every tick, clamps it to the level limits, and only then snaps what gets
 * written to the camera's Transform onto the pixel grid. `smoothPosition` itself
 * is never snapped. With `useLimits` on, initialize and snapToTarget clamp too,
 * so a respawn never shows a frame outside the box.
 *
 * The target is a plain entity id and is never owned: once it stops existing
 * (or loses its Transform) the camera goes idle and holds its last position.
 */
export function createCameraFollowSystem(
  world: IWorld,
  cameraEid: number,
  options: CameraFollowOptions = {}
): CameraFollowControls {
  if (!entityExists(world, cameraEid)) {
    throw new Error(`[CameraFollow] Camera entity ${cameraEid} does not exist.`);
  }
  if (!hasComponent(world, Transform, cameraEid)) {
    addComponent(world, Transform, cameraEid);
  }

  const warnIfTooFast = (next: Readonly<CameraFollowConfig>) => {
    if (next.followSpeed > FOLLOW_SPEED_SOFT_MAX) {
      console.warn(`[CameraFollow] followSpeed ${next.followSpeed} is above ${FOLLOW_SPEED_SOFT_MAX}; smoothing will be barely visible.`);
    }
  };

  const debug = options.debug ?? false;
  let config = resolveCameraFollowConfig(options.config);
  warnIfTooFast(config);
  let target: number | null = null;
  let initialized = false;

  const smoothPosition = new THREE.Vector2();
  const desired = new THREE.Vector2();
  const rendered = new THREE.Vector2();

  const isValidTarget = (eid: number): boolean =>
    entityExists(world, eid) && hasComponent(world, Transform, eid);

  // Drops a target that was removed from the world since it was bound.
  const resolveTarget = (): number | null => {
    if (target === null) return null;
    if (isValidTarget(target)) return target;
    console.warn(`[CameraFollow] Target ${target} no longer exists. Camera is now idle.`);
    target = null;
    return null;
  };

  const readDesired = (eid: number): THREE.Vector2 =>
    desired.set(
      Transform.position.x[eid] + config.offset.x,
      Transform.position.y[eid] + config.offset.y
    );

  // Instant placement (initialize, snap) still respects the limits.
  const placeAt = (worldPos: THREE.Vector2) => {
    smoothPosition.copy(worldPos);
    if (config.useLimits) {
      clampToBounds(smoothPosition, config.limits);
    }
    applyPosition(smoothPosition);
  };

  const applyPosition = (worldPos: THREE.Vector2) => {
    if (config.pixelSnapEnabled) {
      snapToPixelGrid(worldPos, config.pixelSize, rendered);
    } else {
      rendered.copy(worldPos);
    }
    Transform.position.x[cameraEid] = rendered.x;
    Transform.position.y[cameraEid] = rendered.y;
  };

  const initialize = () => {
    // Host smoothing must never run on top of ours.
    if (hasComponent(world, Camera2D, cameraEid) && Camera2D.smoothingEnabled[cameraEid] !== 0) {
      Camera2D.smoothingEnabled[cameraEid] = 0;
      console.log(`[CameraFollow] Disabled host smoothing on camera ${cameraEid}.`);
    }

    const eid = resolveTarget();
    if (eid !== null) {
      placeAt(readDesired(eid));
    } else {
      smoothPosition.set(Transform.position.x[cameraEid], Transform.position.y[cameraEid]);
      applyPosition(smoothPosition);
    }
    initialized = true;
    console.log(
      `[CameraFollow] Initialized camera ${cameraEid} at (${smoothPosition.x.toFixed(2)}, ${smoothPosition.y.toFixed(2)}), target: ${eid ?? 'none'}`
    );
  };

  const tick = (deltaTime: number) => {
    if (!initialized) {
      initialize();
    }
    const eid = resolveTarget();
    if (eid === null) return;

    readDesired(eid);
    if (config.smoothingEnabled) {
      smoothPosition.lerp(desired, followWeight(config.followSpeed, deltaTime));
    } else {
      smoothPosition.copy(desired);
    }

    // Clamp the float position before snapping so the grid never pushes the
    // rendered camera out of the box.
    if (config.useLimits) {
      clampToBounds(smoothPosition, config.limits);
    }

    applyPosition(smoothPosition);

    if (debug) {
      console.log(
        `[CameraFollow DEBUG] dt=${deltaTime.toFixed(4)} desired=(${desired.x.toFixed(2)}, ${desired.y.toFixed(2)}) smooth=(${smoothPosition.x.toFixed(3)}, ${smoothPosition.y.toFixed(3)}) rendered=(${rendered.x}, ${rendered.y})`
      );
    }
  };

  const snapToTarget = () => {
    const eid = resolveTarget();
    if (eid === null) return;
    placeAt(readDesired(eid));
  };

  const setFollowTarget = (newTarget: number | null, snapImmediately = true) => {
    if (newTarget !== null && !isValidTarget(newTarget)) {
      console.warn(`[CameraFollow] Entity ${newTarget} has no Transform or does not exist. Camera is now idle.`);
      target = null;
      return;
    }
    target = newTarget;
    console.log(`[CameraFollow] Following ${newTarget ?? 'nothing'}${newTarget !== null && snapImmediately ? ' (snap)' : ''}`);
    if (snapImmediately) {
      snapToTarget();
    }
  };

  const configure = (patch: CameraFollowConfigPatch): Readonly<CameraFollowConfig> => {
    config = resolveCameraFollowConfig(patch, config);
    warnIfTooFast(config);
    return config;
  };

  if (options.target !== undefined) {
    setFollowTarget(options.target, false);
  }

  const followSystem = defineSystem((currentWorld: IWorld, deltaTime: number) => {
    tick(deltaTime);
    return currentWorld;
  });

  const cleanup = () => {
    target = null;
    initialized = false;
    console.log('CameraFollowSystem cleaned up.');
  };

  return {
    system: followSystem,
    initialize,
    tick,
    snapToTarget,
    setFollowTarget,
    configure,
    getConfig: () => config,
    getFollowTarget: () => target,
    getState: () => (resolveTarget() === null ? 'idle' : 'following'),
    getSmoothPosition: () => smoothPosition.clone(),
    getRenderedPosition: () => rendered.clone(),
    cleanup,
  };
}
