import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { IDENTITY_QUAT } from '../math.js';
import {
  AXIS_CORRECTION_QVEC,
  cameraCenter,
  convertPose,
  hostRotationToQuaternion,
  worldToCamera,
} from '../pose.js';
import type { HostRotation, Vector3 } from '../types.js';

function expectTupleClose(actual: readonly number[], expected: readonly number[], digits = 9): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits));
}

const ORIGIN: Vector3 = { x: 0, y: 0, z: 0 };
const S = Math.SQRT1_2;

// ---------------------------------------------------------------------------
// Fixed point
// ---------------------------------------------------------------------------

describe('convertPose', () => {
  it('maps the identity rotation at the origin to the axis correction', () => {
    const pose = convertPose({ position: ORIGIN, rotation: { kind: 'quaternion', quaternion: IDENTITY_QUAT } });
    expect(pose).toEqual({ qvec: [0, 1, 0, 0], tvec: [0, 0, 0] });
    expect(pose.qvec).toEqual(AXIS_CORRECTION_QVEC);
  });

  it('remaps (x, y, z, w) to scalar-first (x, w, z, -y)', () => {
    const pose = convertPose({
      position: ORIGIN,
      rotation: { kind: 'quaternion', quaternion: { x: 0.5, y: 0.5, z: 0.5, w: 0.5 } },
    });
    expect(pose.qvec).toEqual([0.5, 0.5, 0.5, -0.5]);
  });

  it('translates by the rotated, negated position', () => {
    const pose = convertPose({
      position: { x: 1, y: 2, z: 3 },
      rotation: { kind: 'axisAngle', axis: { x: 0, y: 0, z: 1 }, angle: Math.PI / 2 },
    });
    expectTupleClose(pose.qvec, [0, S, S, 0]);
    expectTupleClose(pose.tvec, [-2, -1, 3]);
  });

  it('normalizes a scaled host quaternion', () => {
    const pose = convertPose({ position: ORIGIN, rotation: { kind: 'quaternion', quaternion: { x: 0, y: 0, z: 0, w: 4 } } });
    expect(pose.qvec).toEqual([0, 1, 0, 0]);
  });
});

// ---------------------------------------------------------------------------
// Rotation modes
// ---------------------------------------------------------------------------

describe('hostRotationToQuaternion', () => {
  const quarterTurnZ: HostRotation[] = [
    { kind: 'quaternion', quaternion: { x: 0, y: 0, z: S, w: S } },
    { kind: 'euler', angles: { x: 0, y: 0, z: Math.PI / 2 }, order: 'XYZ' },
    { kind: 'axisAngle', axis: { x: 0, y: 0, z: 1 }, angle: Math.PI / 2 },
    { kind: 'matrix', rows: [[0, -1, 0], [1, 0, 0], [0, 0, 1]] },
  ];

  it('agrees across every rotation mode', () => {
    for (const rotation of quarterTurnZ) {
      const q = hostRotationToQuaternion(rotation);
      expectTupleClose([q.x, q.y, q.z, q.w], [0, 0, S, S]);
    }
  });
});

// ---------------------------------------------------------------------------
// Inverse consistency
// ---------------------------------------------------------------------------

const arbCoord = fc.double({ min: -100, max: 100, noNaN: true });
const arbPosition = fc.record({ x: arbCoord, y: arbCoord, z: arbCoord });
const arbRotation: fc.Arbitrary<HostRotation> = fc.oneof(
  fc.record({
    x: fc.double({ min: -1, max: 1, noNaN: true }),
    y: fc.double({ min: -1, max: 1, noNaN: true }),
    z: fc.double({ min: -1, max: 1, noNaN: true }),
    w: fc.double({ min: -1, max: 1, noNaN: true }),
  })
    .filter((q) => Math.hypot(q.x, q.y, q.z, q.w) > 1e-3)
    .map((quaternion): HostRotation => ({ kind: 'quaternion', quaternion })),
  fc.record({
    x: fc.double({ min: -Math.PI, max: Math.PI, noNaN: true }),
    y: fc.double({ min: -Math.PI, max: Math.PI, noNaN: true }),
    z: fc.double({ min: -Math.PI, max: Math.PI, noNaN: true }),
  }).map((angles): HostRotation => ({ kind: 'euler', angles, order: 'ZXY' })),
);

describe('pose inverse consistency', () => {
  it('recovers the camera position as the camera centre', () => {
    fc.assert(fc.property(arbPosition, arbRotation, (position, rotation) => {
      const { qvec, tvec } = convertPose({ position, rotation });
      expectTupleClose(cameraCenter(qvec, tvec), [position.x, position.y, position.z], 6);
    }));
  });

  it('places the camera position at the camera origin', () => {
    fc.assert(fc.property(arbPosition, arbRotation, (position, rotation) => {
      const { qvec, tvec } = convertPose({ position, rotation });
      expectTupleClose(worldToCamera(qvec, tvec, [position.x, position.y, position.z]), [0, 0, 0], 6);
    }));
  });

  it('produces a unit quaternion', () => {
    fc.assert(fc.property(arbPosition, arbRotation, (position, rotation) => {
      const { qvec } = convertPose({ position, rotation });
      expect(Math.hypot(...qvec)).toBeCloseTo(1, 9);
    }));
  });
});
