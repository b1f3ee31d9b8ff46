/**
 * Where the CLI takes the target directory from: the argument, the clipboard, or a prompt
 */

export interface DirectoryInputOptions {
  argument?: string;
  fromClipboard?: boolean;
}

export interface DirectoryInputReaders {
  readClipboard: () => Promise<string>;
  prompt: (question: string) => Promise<string>;
}

export const DIRECTORY_PROMPT = '\nEnter the directory path containing the PDF files: ';

/**
 * Resolve the directory to process. An explicit argument wins over the clipboard.
 * @throws Error when every source is empty
 */
export async function resolveDirectoryInput(
  options: DirectoryInputOptions,
  readers: DirectoryInputReaders
): Promise<string> {
  let directory = options.argument?.trim() ?? '';

  if (!directory && options.fromClipboard) {
    directory = (await readers.readClipboard()).trim();
    if (!directory) {
      throw new Error('The clipboard does not contain a directory path');
    }
  }

  if (!directory) {
    directory = (await readers.prompt(DIRECTORY_PROMPT)).trim();
  }

  if (!directory) {
    throw new Error('No directory given');
  }
  return directory;
}
