import { describe, it, expect, beforeEach } from 'vitest';
import { InterruptController } from '../interrupts';
import { BusDriver, RestartResponder, restartOpcode, TState, type TickOutputs } from '@/cpu/i8008';

function outputs(state: TState): TickOutputs {
  return { state, stateCode: 0, sync: false, cycleType: null, bus: null, driver: BusDriver.None };
}

describe('InterruptController', () => {
  let controller: InterruptController;

  beforeEach(() => {
    controller = new InterruptController();
  });

  it('should encode RST opcodes', () => {
    expect(restartOpcode(0)).toBe(0x05);
    expect(restartOpcode(1)).toBe(0x0d);
    expect(restartOpcode(7)).toBe(0x3d);
    expect(() => restartOpcode(8)).toThrow(RangeError);
  });

  it('should share the RST encoding with the CPU default responder', () => {
    expect(new RestartResponder(6).acknowledge()).toBe(restartOpcode(6));
    expect(() => new RestartResponder(-1)).toThrow(RangeError);
  });

  it('should start with the line low', () => {
    expect(controller.requestLine).toBe(false);
    expect(controller.acknowledged).toBe(0);
  });

  it('should raise the line and jam the requested restart', () => {
    controller.requestRestart(2);
    expect(controller.requestLine).toBe(true);
    expect(controller.acknowledge()).toBe(0x15);
    expect(controller.acknowledged).toBe(1);
  });

  it('should jam an arbitrary instruction byte', () => {
    controller.request(0x0e);
    expect(controller.acknowledge()).toBe(0x0e);
  });

  it('should keep the line up until the CPU enters T1I', () => {
    controller.requestRestart(0);
    controller.observe(outputs(TState.T3));
    controller.observe(outputs(TState.Stopped));
    expect(controller.requestLine).toBe(true);
    controller.observe(outputs(TState.T1I));
    expect(controller.requestLine).toBe(false);
  });

  it('should reset to RST 0 with the line low', () => {
    controller.requestRestart(6);
    controller.acknowledge();
    controller.reset();
    expect(controller.requestLine).toBe(false);
    expect(controller.acknowledged).toBe(0);
    expect(controller.acknowledge()).toBe(0x05);
  });
});
