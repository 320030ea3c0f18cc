// Types
export * from './types/capsule.types';

// Schemas
export * from './schemas/capsule.schemas';

// Constants
export * from './constants/capsule';
