import type { HelpTopic } from './modes.js';

const HELP_LINES: Record<HelpTopic, readonly string[]> = {
  normal: [
    '<q>    Exit the program',
    '<f>    Switch to Folder mode (also <Tab>)',
    '<s>    Switch to Search mode (also </>)',
    '<m>    Switch to Model mode',
    '<c>    Switch to Match mode',
    '<t>    Pick a tenant',
    '<h>    Show this help (also <F1>)',
  ],
  search: [
    '<Esc>        Exit to Normal mode',
    '<Enter>      Execute search (an empty query is not sent)',
    '<Backspace>  Delete the previous character',
    '<Delete>     Delete the character under the cursor',
    '<Left>       Move left (<Right> moves right)',
    '<Home>       Jump to the start (<End> jumps to the end)',
    '<Alt+h>      Show this help (also <F1>)',
  ],
  folder: [
    '<Esc>        Exit to Normal mode',
    '<Up>/<Down>  Select the previous/next folder',
    '<Home>/<End> Select the first/last folder',
    '<Enter>      List the models of the selected folder',
    '<r>          Reload the list of folders',
    '<Tab>        Switch to Model mode',
  ],
  model: [
    '<Esc>        Exit to Normal mode',
    '<Up>/<Down>  Select the previous/next model',
    '<Home>/<End> Select the first/last model',
    '<Enter>      Use the selected model for matching',
    '<Tab>        Switch to Folder mode',
  ],
  match: [
    '<Esc>    Exit to Normal mode',
    '',
    'The model picked in Model mode is the one matched.',
  ],
  tenant: [
    '<Esc>        Close the tenant picker',
    '<Up>/<Down>  Select the previous/next tenant',
    '<Home>/<End> Select the first/last tenant',
    '<Enter>      Connect to the selected tenant and reload its folders',
  ],
};

const CLOSE_HINT = 'Press any key to close this help.';

export function getHelpLines(topic: HelpTopic): string[] {
  return [...HELP_LINES[topic], '', CLOSE_HINT];
}

export function getHelpText(topic: HelpTopic): string {
  return getHelpLines(topic).join('\n');
}
