// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Command types
export * from './command.types';

// Commit message types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// Version control types
export * from './git.types';

// GitHub related types
export * from './github.types';

// Node:child_process types
export * from './node-child-process.types';

// Release note types
export * from './release-note.types';
