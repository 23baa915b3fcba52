import { describe, expect, it } from 'vitest';
import { makeFrame } from '../testing';
import { PushPoseProvider } from './pushProvider';

describe('PushPoseProvider', () => {
  it('ignores frames until started', () => {
    const provider = new PushPoseProvider();
    expect(provider.publish(makeFrame(1))).toBe(false);
    expect(provider.getLatest()).toBeNull();
  });

  it('hands out only the newest frame, once', () => {
    const provider = new PushPoseProvider();
    provider.start();
    provider.publish(makeFrame(1));
    provider.publish(makeFrame(2));

    expect(provider.getLatest()?.timestamp).toBe(2);
    expect(provider.getLatest()).toBeNull();
    expect(provider.droppedFrames).toBe(1);
  });

  it('rejects frames older than the last accepted one', () => {
    const provider = new PushPoseProvider();
    provider.start();
    expect(provider.publish(makeFrame(10))).toBe(true);
    expect(provider.publish(makeFrame(5))).toBe(false);
    expect(provider.publish(makeFrame(10))).toBe(true);
    expect(provider.getLatest()?.timestamp).toBe(10);
  });

  it('drops any pending frame on stop', () => {
    const provider = new PushPoseProvider();
    provider.start();
    provider.publish(makeFrame(1));
    provider.stop();
    expect(provider.isActive).toBe(false);
    expect(provider.getLatest()).toBeNull();
  });
});
