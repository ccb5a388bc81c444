/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { addCommand, deriveCommand, updateCommand } from './add.js';
export { rmCommand } from './rm.js';
export { tagCommand, untagCommand, tagLogCommand } from './tag.js';
export { showCommand } from './show.js';
export { listCommand } from './list.js';
export { lineageCommand } from './lineage.js';
export { renameCommand, describeCommand } from './edit.js';
