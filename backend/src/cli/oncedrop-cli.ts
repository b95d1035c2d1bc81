#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { ShareClient } from './client';

dotenv.config();

type GlobalOptions = {
  server: string;
  secret?: string;
};

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('oncedrop')
    .description('Share files through links that expire after a few downloads')
    .version('1.0.0')
    .option('-s, --server <url>', 'server base URL', process.env.ONCEDROP_SERVER || 'http://localhost:8080')
    .option('--secret <value>', 'shared upload secret', process.env.UPLOAD_SECRET);

  const client = (): ShareClient => {
    const { server, secret } = program.opts<GlobalOptions>();
    return new ShareClient({ server, secret });
  };

  program
    .command('upload <file>')
    .description('Upload a file and print its link')
    .option('-n, --max-downloads <count>', 'downloads allowed before the link is burned', positiveInt)
    .option('-t, --ttl <seconds>', 'link lifetime in seconds', positiveInt)
    .action(async (file: string, options: { maxDownloads?: number; ttl?: number }) => {
      const api = client();
      const result = await api.upload(file, {
        maxDownloads: options.maxDownloads,
        ttlSeconds: options.ttl
      });

      console.log(chalk.green('✅ Uploaded'));
      console.log(`${chalk.cyan('Link:')}      ${api.linkUrl(result)}`);
      console.log(`${chalk.cyan('Downloads:')} ${result.remainingDownloads}`);
      console.log(`${chalk.cyan('Expires:')}   ${result.expiresAt} (in ${result.expiresInSeconds}s)`);
    });

  program
    .command('download <link>')
    .description('Download a file, using up one of its downloads')
    .option('-o, --output <path>', 'where to write the file (overwrites it)')
    .action(async (link: string, options: { output?: string }) => {
      const result = await client().download(link, options.output);
      console.log(chalk.green(`✅ Saved ${result.path} (${formatBytes(result.bytes)})`));
      if (result.remainingDownloads !== undefined) {
        const note = result.remainingDownloads === 0 ? chalk.yellow('link is now burned') : `${result.remainingDownloads} downloads left`;
        console.log(note);
      }
    });

  program
    .command('info <link>')
    .description('Show what is behind a link without downloading it')
    .action(async (link: string) => {
      const info = await client().info(link);
      console.log(`${chalk.cyan('File:')}      ${info.filename} (${formatBytes(info.size)}, ${info.contentType})`);
      console.log(`${chalk.cyan('Downloads:')} ${info.remainingDownloads} of ${info.maxDownloads} left`);
      console.log(`${chalk.cyan('Expires:')}   ${info.expiresAt} (in ${info.expiresInSeconds}s)`);
    });

  program
    .command('health')
    .description('Check server health')
    .action(async () => {
      const health = await client().health();
      const healthy = health.status === 'healthy';
      console.log(healthy ? chalk.green('✅ healthy') : chalk.red(`❌ ${String(health.status)}`));
      console.log(JSON.stringify(health, null, 2));
      if (!healthy) {
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch(error => {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
