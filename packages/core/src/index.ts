export const name = '@treedump/core';

export * from './config/loader';
export * from './dump/types';
export * from './dump/service';
export * from './check/service';
export * from './inspect/service';
