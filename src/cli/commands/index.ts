// Re-export command registration functions

export { registerCallCommand } from './call.js';
export { registerServersCommand } from './servers.js';
export { registerShellCommand } from './shell.js';
export { registerToolsCommand } from './tools.js';
