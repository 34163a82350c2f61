export const name = '@treedump/repo';

export * from './ignore/matcher';
export * from './ignore/rules';
export * from './classify/opaque';
export * from './classify/classifier';
export * from './content/reader';
export * from './walker/types';
export * from './walker/nodeFs';
export * from './walker/walker';
export * from './report/format';
export * from './report/writer';
export * from './report/parser';
