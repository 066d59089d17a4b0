export * from './event-log';
export * from './contract-host';
export * from './file-event-log';
