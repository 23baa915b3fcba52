import { z } from 'zod';
import { ValidationError } from './errors';
import type { FrameMetadata, Joint, SkeletonFrame, WireFrame, WireJoint } from './types';

export function createSkeletonFrame(
  joints: Iterable<Joint>,
  timestamp: number,
  metadata: FrameMetadata = {}
): SkeletonFrame {
  if (!Number.isInteger(timestamp)) {
    throw new ValidationError(`Frame timestamp must be integer milliseconds, got ${timestamp}`);
  }
  const byName = new Map<string, Joint>();
  for (const joint of joints) {
    if (byName.has(joint.name)) {
      throw new ValidationError(`Duplicate joint name: ${joint.name}`);
    }
    if (!(joint.confidence >= 0 && joint.confidence <= 1)) {
      throw new ValidationError(`Joint '${joint.name}' confidence ${joint.confidence} is outside [0, 1]`);
    }
    byName.set(joint.name, joint);
  }
  return { joints: byName, timestamp, metadata };
}

function toWireJoint(joint: Joint): WireJoint {
  const { position, rotation } = joint;
  return {
    name: joint.name,
    position: { x: position.x, y: position.y, z: position.z },
    rotation: rotation ? { x: rotation.x, y: rotation.y, z: rotation.z, w: rotation.w } : null,
    confidence: joint.confidence,
  };
}

/**
 * Build the wire payload with a fixed key order. `meta` is only present when the
 * frame carries metadata.
 */
export function toWireFrame(frame: SkeletonFrame): WireFrame {
  const wire: WireFrame = {
    timestamp: frame.timestamp,
    joints: Array.from(frame.joints.values(), toWireJoint),
  };
  if (Object.keys(frame.metadata).length > 0) {
    wire.meta = frame.metadata;
  }
  return wire;
}

export function encodeFrame(frame: SkeletonFrame): string {
  return JSON.stringify(toWireFrame(frame));
}

const vector3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() });

const wireJointSchema = z.object({
  name: z.string().min(1),
  position: vector3Schema,
  rotation: z.object({ x: z.number(), y: z.number(), z: z.number(), w: z.number() }).nullable().optional(),
  confidence: z.number().min(0).max(1),
});

export const wireFrameSchema = z.object({
  timestamp: z.number().int(),
  joints: z.array(wireJointSchema),
  meta: z.record(z.unknown()).optional(),
});

/** Parse a wire payload back into a frame. Throws `ValidationError` on a malformed value. */
export function decodeWireFrame(value: unknown): SkeletonFrame {
  const parsed = wireFrameSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Malformed skeleton frame: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const { timestamp, joints, meta } = parsed.data;
  return createSkeletonFrame(
    joints.map((j) => ({
      name: j.name,
      position: j.position,
      rotation: j.rotation ?? undefined,
      confidence: j.confidence,
    })),
    timestamp,
    meta ?? {}
  );
}
