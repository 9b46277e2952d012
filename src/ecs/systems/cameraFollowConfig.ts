import type { Bounds, Vec2 } from '../../shared/types';
import {
  DEFAULT_FOLLOW_SPEED,
  DEFAULT_LIMIT,
  DEFAULT_PIXEL_SIZE,
  PIXEL_SIZE_MAX,
} from '../../shared/constants';

export interface CameraFollowConfig {
  smoothingEnabled: boolean;
  followSpeed: number;
  pixelSize: number;
  pixelSnapEnabled: boolean;
  offset: Vec2;
  useLimits: boolean;
  limits: Bounds;
}

export type CameraFollowConfigPatch = Partial<Omit<CameraFollowConfig, 'offset' | 'limits'>> & {
  offset?: Partial<Vec2>;
  limits?: Partial<Bounds>;
};

export interface ConfigIssue {
  field: string;
  message: string;
}

export class CameraConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid camera follow config: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`);
    this.name = 'CameraConfigError';
    this.issues = issues;
  }
}

export const DEFAULT_CAMERA_FOLLOW_CONFIG: Readonly<CameraFollowConfig> = freezeConfig({
  smoothingEnabled: true,
  followSpeed: DEFAULT_FOLLOW_SPEED,
  pixelSize: DEFAULT_PIXEL_SIZE,
  pixelSnapEnabled: true,
  offset: { x: 0, y: 0 },
  useLimits: false,
  limits: {
    left: -DEFAULT_LIMIT,
    right: DEFAULT_LIMIT,
    top: -DEFAULT_LIMIT,
    bottom: DEFAULT_LIMIT,
  },
});

function freezeConfig(config: CameraFollowConfig): Readonly<CameraFollowConfig> {
  Object.freeze(config.offset);
  Object.freeze(config.limits);
  return Object.freeze(config);
}

/**
 * Returns every problem with `config`; an empty array means it is usable.
 * Limits are checked even while `useLimits` is off so that turning them on
 * later can never expose an inverted box.
 */
export function validateCameraFollowConfig(config: CameraFollowConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!Number.isFinite(config.followSpeed) || config.followSpeed <= 0) {
    issues.push({ field: 'followSpeed', message: `must be a finite number > 0 (got ${config.followSpeed})` });
  }
  if (!Number.isFinite(config.pixelSize) || config.pixelSize <= 0 || config.pixelSize > PIXEL_SIZE_MAX) {
    issues.push({ field: 'pixelSize', message: `must be in (0, ${PIXEL_SIZE_MAX}] (got ${config.pixelSize})` });
  }
  if (!Number.isFinite(config.offset.x) || !Number.isFinite(config.offset.y)) {
    issues.push({ field: 'offset', message: `must be finite (got ${config.offset.x}, ${config.offset.y})` });
  }

  const { left, right, top, bottom } = config.limits;
  if (![left, right, top, bottom].every(Number.isFinite)) {
    issues.push({ field: 'limits', message: 'must all be finite' });
  } else {
    if (left >= right) {
      issues.push({ field: 'limits.left', message: `must be < limits.right (${left} >= ${right})` });
    }
    if (top >= bottom) {
      issues.push({ field: 'limits.top', message: `must be < limits.bottom (${top} >= ${bottom})` });
    }
  }

  return issues;
}

/**
 * Merges `patch` over `base` (offset and limits merge per field), validates the
 * result and returns it frozen. Throws CameraConfigError when invalid; `base`
 * is never touched.
 */
export function resolveCameraFollowConfig(
  patch: CameraFollowConfigPatch = {},
  base: Readonly<CameraFollowConfig> = DEFAULT_CAMERA_FOLLOW_CONFIG
): Readonly<CameraFollowConfig> {
  const merged: CameraFollowConfig = {
    smoothingEnabled: patch.smoothingEnabled ?? base.smoothingEnabled,
    followSpeed: patch.followSpeed ?? base.followSpeed,
    pixelSize: patch.pixelSize ?? base.pixelSize,
    pixelSnapEnabled: patch.pixelSnapEnabled ?? base.pixelSnapEnabled,
    offset: { ...base.offset, ...patch.offset },
    useLimits: patch.useLimits ?? base.useLimits,
    limits: { ...base.limits, ...patch.limits },
  };

  const issues = validateCameraFollowConfig(merged);
  if (issues.length > 0) {
    throw new CameraConfigError(issues);
  }
  return freezeConfig(merged);
}
