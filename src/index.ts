/**
 * argspec - declare, parse, validate and read command-line arguments
 */

export * from './core';
export * from './cli';
export * from './config';
export * from './logging';
export * from './schemas';
export * from './types';
