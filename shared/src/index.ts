// Core types and enums for the portfolio temperature score service
export * from './enums.js';
export * from './portfolio.js';
export * from './scenario.js';
export * from './scores.js';
export * from './api.js';
