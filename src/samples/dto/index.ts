export * from './query-samples.dto';
export * from './response.dto';
