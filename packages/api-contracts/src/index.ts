export * from './common/enums.js';
export * from './common/errors.js';
export * from './common/query.js';
export * from './common/responses.js';

export * from './entities/media.js';

export * from './endpoints/images/list.js';
export * from './endpoints/images/process.js';
export * from './endpoints/images/batchProcess.js';
export * from './endpoints/images/status.js';
export * from './endpoints/compression/stats.js';
