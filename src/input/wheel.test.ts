import { describe, it, expect } from 'vitest';
import { scrollInputFromWheel, type WheelLike } from './wheel';

function wheel(extra?: Partial<WheelLike>): WheelLike {
  return {
    deltaX: 0,
    deltaY: 0,
    deltaMode: 0,
    ctrlKey: false,
    metaKey: false,
    shiftKey: false,
    clientX: 10,
    clientY: 20,
    timeStamp: 1234,
    ...extra,
  };
}

describe('scrollInputFromWheel', () => {
  it('passes pixel deltas through', () => {
    expect(scrollInputFromWheel(wheel({ deltaX: 3, deltaY: -7 }))).toEqual({
      point: { x: 10, y: 20 },
      deltaX: 3,
      deltaY: -7,
      zoom: false,
      timeStamp: 1234,
    });
  });

  it('converts line and page deltas to pixels', () => {
    expect(scrollInputFromWheel(wheel({ deltaY: 3, deltaMode: 1 })).deltaY).toBe(48);
    expect(scrollInputFromWheel(wheel({ deltaY: 1, deltaMode: 2 })).deltaY).toBe(800);
  });

  it('treats ctrl and meta as zoom', () => {
    expect(scrollInputFromWheel(wheel({ deltaY: 5, ctrlKey: true })).zoom).toBe(true);
    expect(scrollInputFromWheel(wheel({ deltaY: 5, metaKey: true })).zoom).toBe(true);
  });

  it('turns shift+wheel into a horizontal scroll', () => {
    const input = scrollInputFromWheel(wheel({ deltaY: 12, shiftKey: true }));
    expect(input.deltaX).toBe(12);
    expect(input.deltaY).toBe(0);
  });
});
