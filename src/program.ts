/**
 * msftool command definitions.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { packDirectory } from './pack.js';
import { unpackArchive } from './unpack.js';

// Version is set at build time
const version = '0.1.0';

/**
 * Builds the `msftool` program with its `pack` and `unpack` commands.
 * Failures are printed to stderr and turn into a non-zero exit status.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('msftool')
    .description('Pack a directory tree into a single MSF archive and unpack it again')
    .version(version);

  program
    .command('pack')
    .description('Pack every regular file under a directory into an MSF archive')
    .argument('<archive-path>', 'Path where the archive will be written')
    .argument('<directory-path>', 'Directory to pack')
    .action(async (archivePath: string, directoryPath: string) => {
      try {
        const summary = await packDirectory({
          inputDir: resolve(directoryPath),
          archivePath: resolve(archivePath)
        });

        console.log('');
        console.log(`✅ Pack completed successfully! ${summary.fileCount} files, ${summary.totalSize} bytes`);
      } catch (error) {
        console.error('❌ Pack failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });

  program
    .command('unpack')
    .description('Unpack an MSF archive into a directory')
    .argument('<archive-path>', 'Path to the archive to unpack')
    .argument('<directory-path>', 'Directory where the files will be recreated')
    .action(async (archivePath: string, directoryPath: string) => {
      try {
        const summary = await unpackArchive({
          archivePath: resolve(archivePath),
          outputDir: resolve(directoryPath)
        });

        console.log('');
        console.log(`✅ Unpack completed successfully! ${summary.fileCount} files`);
      } catch (error) {
        console.error('❌ Unpack failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });

  return program;
}
