export * from './address';
export * from './client';
export * from './description';
export * from './email';
export * from './frequency';
export * from './name';
export * from './phone';
export * from './priority';
export * from './product-preference';
export * from './tag';
