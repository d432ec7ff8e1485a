
export * from './excel-types';
export * from './excel-helpers';
export * from './excel-data-extractor';
export * from './excel-aggregator-core';
export * from './excel-validator';
export * from './excel-aggregator-reports';
export * from './pipeline-errors';
export * from './pipeline-config';
export * from './logger';
export * from './loss-pipeline';
