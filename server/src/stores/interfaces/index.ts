export type { IStatusRecordStore } from './IStatusRecordStore';
