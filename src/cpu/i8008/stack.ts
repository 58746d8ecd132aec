/**
 * 8-level on-chip address stack.
 *
 * Push stores at the pointer and advances; pop retreats and loads. The
 * pointer wraps modulo 8 with no overflow detection: a ninth nested
 * push replaces the oldest frame.
 */

import { ADDRESS_MASK, STACK_DEPTH, type AddressStack } from './types';

export const EMPTY_STACK: AddressStack = {
  slots: new Array<number>(STACK_DEPTH).fill(0),
  pointer: 0,
};

export function pushAddress(stack: AddressStack, address: number): AddressStack {
  const slots = stack.slots.slice();
  slots[stack.pointer] = address & ADDRESS_MASK;
  return { slots, pointer: (stack.pointer + 1) % STACK_DEPTH };
}

export function popAddress(stack: AddressStack): { stack: AddressStack; address: number } {
  const pointer = (stack.pointer + STACK_DEPTH - 1) % STACK_DEPTH;
  return {
    stack: { slots: stack.slots, pointer },
    address: stack.slots[pointer],
  };
}
