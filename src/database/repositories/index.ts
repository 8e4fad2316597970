export * from './domain.types';
export * from './idat-file.repository';
export * from './sample.repository';
export * from './study.repository';
