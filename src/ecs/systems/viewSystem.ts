import { defineQuery, defineSystem, enterQuery, exitQuery, defineComponent, hasComponent, Types } from 'bitecs';
import type { IWorld } from 'bitecs';
import { Object3D, OrthographicCamera } from 'three';
import { Transform } from '../world';
import { Camera2D } from '../components/camera';
import { followWeight } from '../../utils/pixelGrid';

// Marks entities that have a three.js object registered in object3DMap
export const Object3DRef = defineComponent({
  value: Types.ui32,
});

// Object3D instances live outside the component store; bitecs only holds numbers.
export const object3DMap = new Map<number, Object3D>();

const viewQuery = defineQuery([Transform, Object3DRef]);
const enterViewQuery = enterQuery(viewQuery);
const exitViewQuery = exitQuery(viewQuery);

/**
 * Copies Transform positions onto the registered Object3Ds.
 *
 * A Camera2D with smoothingEnabled gets the host's built-in smoothing instead:
 * its object eases toward the Transform by smoothingSpeed * dt per frame.
 */
export const createViewSystem = () => {
  return defineSystem((world: IWorld, deltaTime: number) => {
    enterViewQuery(world).forEach((entity) => {
      const object3D = object3DMap.get(entity);
      if (!object3D) {
        console.warn(`[ViewSystem] Entity ${entity} has Object3DRef but no Object3D in map.`);
        return;
      }
      // Start where the entity is; no slide in from the origin.
      object3D.position.x = Transform.position.x[entity];
      object3D.position.y = Transform.position.y[entity];
    });

    viewQuery(world).forEach((entity) => {
      const object3D = object3DMap.get(entity);
      if (!object3D) return;

      const x = Transform.position.x[entity];
      const y = Transform.position.y[entity];

      if (hasComponent(world, Camera2D, entity)) {
        if (Camera2D.smoothingEnabled[entity] !== 0) {
          const t = followWeight(Camera2D.smoothingSpeed[entity], deltaTime);
          object3D.position.x += (x - object3D.position.x) * t;
          object3D.position.y += (y - object3D.position.y) * t;
        } else {
          object3D.position.x = x;
          object3D.position.y = y;
        }
        if (object3D instanceof OrthographicCamera && object3D.zoom !== Camera2D.zoom[entity]) {
          object3D.zoom = Camera2D.zoom[entity];
          object3D.updateProjectionMatrix();
        }
        return;
      }

      object3D.position.x = x;
      object3D.position.y = y;
    });

    exitViewQuery(world).forEach((entity) => {
      object3DMap.delete(entity);
    });

    return world;
  });
};

// Registers an Object3D for an entity; add Object3DRef (and Transform) for it to sync
export const addObject3DToEntity = (entity: number, object3D: Object3D) => {
  Object3DRef.value[entity] = entity;
  object3DMap.set(entity, object3D);
};

export const removeObject3DFromEntity = (entity: number) => {
  object3DMap.delete(entity);
};
