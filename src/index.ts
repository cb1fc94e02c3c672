export * from './lib/errors';
export * from './lib/screening-types';
export * from './lib/validations/config';
export * from './lib/validations/records';
export * from './lib/concurrency';
export * from './lib/targetExtractor';
export * from './lib/modelBatchDispatcher';
export * from './lib/screeningDispatcher';
export * from './lib/resultAggregator';
export * from './lib/reportExport';
export * from './lib/inputParsers';
export * from './lib/api';
export * from './lib/store';
export * from './lib/pipeline-types';
export * from './lib/storage/resultStore';
export * from './lib/storage/fileResultStore';
export * from './lib/storage/supabaseResultStore';
export * from './lib/pipelines';
