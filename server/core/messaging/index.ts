export * from './types';
export * from './ordering';
export * from './messagingStore';
export * from './participants';
export * from './messagingService';
