import { createWriteStream, mkdirSync } from 'node:fs';
import path from 'node:path';

export type Sink = {
  write: (text: string) => Promise<void>;
  close: () => Promise<void>;
};

/** `-` or an empty path writes to stdout; anything else truncates and writes the file. */
export async function openSink(targetPath: string): Promise<Sink> {
  if (targetPath === '-' || targetPath === '') {
    return {
      write: async (text: string) => {
        process.stdout.write(text);
      },
      close: async () => {},
    };
  }
  const target = path.resolve(targetPath);
  mkdirSync(path.dirname(target), { recursive: true });
  const stream = createWriteStream(target, { flags: 'w' });
  await new Promise<void>((resolve, reject) => {
    stream.once('open', () => resolve());
    stream.once('error', reject);
  });
  return {
    write: (text: string) =>
      new Promise<void>((resolve, reject) => {
        stream.write(text, (error: NodeJS.ErrnoException | null | undefined) => {
          if (error) reject(error);
          else resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        stream.end((error: NodeJS.ErrnoException | null | undefined) => {
          if (error) reject(error);
          else resolve();
        });
      }),
  };
}
