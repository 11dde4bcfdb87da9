export { buildSlots } from './slot-grid';
export type { SlotGrid } from './types';
