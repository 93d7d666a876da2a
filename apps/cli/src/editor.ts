import { execa } from 'execa';

/** Opens `file` in `editor` and resolves once the editor exits */
export type EditorLauncher = (editor: string, file: string) => Promise<void>;

/** The editor string may carry its own arguments, e.g. `code -w` */
export const openInEditor: EditorLauncher = async (editor, file) => {
  const [command, ...args] = editor.trim().split(/\s+/);
  if (!command) throw new Error('No editor configured');
  await execa(command, [...args, file], { stdio: 'inherit' });
};
