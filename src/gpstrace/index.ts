export { GpsTrace } from './gps-trace.js';
export { GpsTracePoint } from './gps-trace-point.js';
