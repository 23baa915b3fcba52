import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { createSkeletonFrame, decodeWireFrame, encodeFrame, toWireFrame } from './frame';
import { makeFrame } from './testing';

describe('toWireFrame', () => {
  it('lays out timestamp, joints and meta in a fixed order', () => {
    const frame = makeFrame(42, { session: 'a' });
    expect(encodeFrame(frame)).toBe(
      '{"timestamp":42,"joints":[' +
        '{"name":"hips","position":{"x":0,"y":1,"z":0},"rotation":null,"confidence":0.9},' +
        '{"name":"head","position":{"x":0,"y":1.7,"z":0.1},"rotation":{"x":0,"y":0,"z":0,"w":1},"confidence":0.8}' +
        '],"meta":{"session":"a"}}'
    );
  });

  it('omits meta when the frame has none', () => {
    expect('meta' in toWireFrame(makeFrame(1))).toBe(false);
  });
});

describe('createSkeletonFrame', () => {
  it('rejects duplicate joint names', () => {
    const joint = { name: 'hips', position: { x: 0, y: 0, z: 0 }, confidence: 1 };
    expect(() => createSkeletonFrame([joint, joint], 0)).toThrow(ValidationError);
  });

  it('rejects fractional timestamps and out-of-range confidence', () => {
    expect(() => createSkeletonFrame([], 1.5)).toThrow(ValidationError);
    expect(() =>
      createSkeletonFrame([{ name: 'hips', position: { x: 0, y: 0, z: 0 }, confidence: 1.2 }], 0)
    ).toThrow(/outside \[0, 1\]/);
  });
});

describe('decodeWireFrame', () => {
  it('reads the wire layout back into a frame', () => {
    const frame = decodeWireFrame(JSON.parse(encodeFrame(makeFrame(7, { a: 1 }))));
    expect(frame.timestamp).toBe(7);
    expect([...frame.joints.keys()]).toEqual(['hips', 'head']);
    expect(frame.joints.get('hips')?.rotation).toBeUndefined();
    expect(frame.metadata).toEqual({ a: 1 });
  });

  it('rejects payloads without joints', () => {
    expect(() => decodeWireFrame({ timestamp: 1 })).toThrow(ValidationError);
  });
});
