export * from './Resource';
