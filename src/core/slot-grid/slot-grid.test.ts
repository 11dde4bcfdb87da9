/**
 * Unit tests for the time-slot grid builder
 */

import { buildSlots } from './slot-grid';

describe('buildSlots', () => {
  // ═══════════════════════════════════════════════════════════════
  // Current slot
  // ═══════════════════════════════════════════════════════════════

  describe('current slot', () => {
    it('should floor now to the slot boundary', () => {
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52, 31, 400), 15, 45);

      expect(grid.current).toEqual(new Date(2024, 0, 1, 10, 45, 0, 0));
    });

    it('should be the first slot', () => {
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52, 31), 15, 45);

      expect(grid.slots[0]).toEqual(grid.current);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Grid contents
  // ═══════════════════════════════════════════════════════════════

  describe('grid', () => {
    it('should step back one slot at a time up to the max age', () => {
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52, 31), 15, 45);

      expect(grid.slots).toEqual([
        new Date(2024, 0, 1, 10, 45),
        new Date(2024, 0, 1, 10, 30),
        new Date(2024, 0, 1, 10, 15),
        new Date(2024, 0, 1, 10, 0),
      ]);
    });

    it('should include the max age boundary only when it is a whole step', () => {
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52), 15, 44);

      expect(grid.slots).toHaveLength(3);
      expect(grid.slots[2]).toEqual(new Date(2024, 0, 1, 10, 15));
    });

    it('should contain only the current slot when max age is 0', () => {
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52), 15, 0);

      expect(grid.slots).toEqual([new Date(2024, 0, 1, 10, 45)]);
    });

    it('should cross midnight', () => {
      const grid = buildSlots(new Date(2024, 0, 2, 0, 5), 15, 30);

      expect(grid.slots).toEqual([
        new Date(2024, 0, 2, 0, 0),
        new Date(2024, 0, 1, 23, 45),
        new Date(2024, 0, 1, 23, 30),
      ]);
    });

    it('should step by the slot size even when it does not divide the hour', () => {
      // 10:52 floored to a 7-minute grid -> 10:49
      const grid = buildSlots(new Date(2024, 0, 1, 10, 52), 7, 14);

      expect(grid.slots).toEqual([
        new Date(2024, 0, 1, 10, 49),
        new Date(2024, 0, 1, 10, 42),
        new Date(2024, 0, 1, 10, 35),
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Grid invariants across configurations
  // ═══════════════════════════════════════════════════════════════

  describe('invariants', () => {
    const cases: Array<[number, number]> = [
      [1, 0], [5, 12], [10, 60], [15, 45], [15, 90], [20, 59], [30, 180], [60, 240],
    ];
    const now = new Date(2024, 4, 17, 14, 38, 12);

    it.each(cases)('slot=%i max=%i: length is floor(max/slot)+1', (slot, max) => {
      expect(buildSlots(now, slot, max).slots).toHaveLength(Math.floor(max / slot) + 1);
    });

    it.each(cases)('slot=%i max=%i: strictly decreasing', (slot, max) => {
      const slots = buildSlots(now, slot, max).slots;
      for (let i = 1; i < slots.length; i++) {
        expect(slots[i].getTime()).toBeLessThan(slots[i - 1].getTime());
      }
    });

    it.each(cases)('slot=%i max=%i: first minute is an aligned floor of now', (slot, max) => {
      const first = buildSlots(now, slot, max).slots[0];
      expect(first.getMinutes() % slot).toBe(0);
      expect(first.getMinutes()).toBeLessThanOrEqual(now.getMinutes());
      expect(first.getSeconds()).toBe(0);
      expect(first.getMilliseconds()).toBe(0);
    });
  });
});
