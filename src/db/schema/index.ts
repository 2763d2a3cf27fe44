export * from './people';
export * from './timeline';
export * from './market';
export * from './extevents';
export * from './audit';
