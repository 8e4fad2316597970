export * from './query-studies.dto';
export * from './response.dto';
