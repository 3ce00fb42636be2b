/**
 * Instructional text for the interactive shell
 */

export const shellGuidance = {
  prompt: 'toolwire> ',
  banner: (server: string, toolCount: number) =>
    `Connected to ${server} (${toolCount} tool${toolCount === 1 ? '' : 's'}). Type 'help' for commands.`,
  help: [
    'Commands:',
    '  tools                    List the tools the server offers',
    '  call <tool> [json-args]  Call a tool, e.g. call echo {"text":"hi"}',
    '  help                     Show this help',
    '  quit                     Close the session and exit',
  ],
  noTools: 'The server reported no tools.',
  toolError: (text: string) => `Tool error: ${text}`,
  goodbye: 'Session closed.',
} as const;
