export { now } from './time';
export {
  floorToSlot,
  addMinutes,
  minutesBetween,
  formatApiMinute,
  parseApiTimestamp
} from './helpers';
