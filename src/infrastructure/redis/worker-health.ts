/** Heartbeat key the worker refreshes with a TTL; a missing key means the worker is down. */
export const WORKER_HEALTH_KEY = 'worker:health';
