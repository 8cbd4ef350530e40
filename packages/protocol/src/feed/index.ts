export { locationTypeTag, toWireEvent, describeEvent } from './wire.js';
export { isWireEvent, stringifyEventLog, parseEventLog } from './ndjson.js';
