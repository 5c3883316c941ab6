export const WORKER_CONFIG = Symbol('WORKER_CONFIG');
export const PG_POOL = Symbol('PG_POOL');
export const JOB_QUEUE = Symbol('JOB_QUEUE');
export const PROFILE_SOURCE = Symbol('PROFILE_SOURCE');
export const UPLOADER = Symbol('UPLOADER');
