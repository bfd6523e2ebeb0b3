/** ioredis connection that only issues PUBLISH (worker side) */
export const REDIS_PUBLISHER_CLIENT = Symbol('biocurate:redis:publisher');

/** ioredis connection held in subscriber mode for the SSE streams (gateway side) */
export const REDIS_SUBSCRIBER_CLIENT = Symbol('biocurate:redis:subscriber');
