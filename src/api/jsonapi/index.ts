export * from './builder.ts';
export * from './resources.ts';
export * from './request.ts';
