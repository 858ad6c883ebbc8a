import { spawn } from 'child_process';

export type ImageOpener = (filePath: string) => Promise<void>;

function viewerCommand(filePath: string): { command: string; args: string[] } {
  switch (process.platform) {
    case 'darwin':
      return { command: 'open', args: [filePath] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', filePath] };
    default:
      return { command: 'xdg-open', args: [filePath] };
  }
}

/**
 * Hands the image to the desktop's default viewer and returns once the
 * viewer process has started; it keeps running after we exit.
 */
export const openImage: ImageOpener = (filePath) => {
  const { command, args } = viewerCommand(filePath);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => reject(new Error(`Could not open ${filePath} with ${command}: ${error.message}`)));
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
};
