export * from './requests';
export * from './results';
export * from './records';
export * from './sorting';
