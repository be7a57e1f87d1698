// src/schema/index.ts

export * from './config';
export * from './structure';
export * from './target';
