export * from './kinds.js';
export * from './records.js';
export * from './zones.js';
export * from './host.js';
export * from './address.js';
export * from './cname.js';
export * from './mx.js';
export * from './ptr.js';
export * from './txt.js';
