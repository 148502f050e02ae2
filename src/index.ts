export * from './types';
export * from './errors';
export * from './constants';
export * from './objects';
export * from './lexer';
export * from './serializer';
export * from './object-parser';
export * from './xref';
export * from './byte-writer';
export * from './updater';
export * from './page-tree';
export * from './sign';
export * from './signer';
export * from './utils';

// Default export for convenience
import { sign } from './sign';
export default sign;
