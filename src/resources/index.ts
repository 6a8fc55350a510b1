export { createFsResourceTree, resolveTreePath } from './fs-tree.js';
export { createMemoryResourceTree } from './memory-tree.js';
