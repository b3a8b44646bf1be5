export const QDRANT_CLIENT = 'QDRANT_CLIENT';
