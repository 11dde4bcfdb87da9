export { selectReading } from './selector';
export { parseRecord } from './helpers';
export { RECORD_FIELDS } from './types';
export type { RawRecord, Reading, Selection } from './types';
