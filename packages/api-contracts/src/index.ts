export * from './common/enums';
export * from './common/errors';

export * from './endpoints/resource/get';
