export * from './geodesy/index.js';
