export * from './clause';
export * from './elements';
export * from './expressions';
export * from './having';
export * from './join';
export * from './order-by';
export * from './where';
