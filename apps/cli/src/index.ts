#!/usr/bin/env -S node --import tsx

import 'dotenv/config';
import { Command } from 'commander';
import type { TickboxConfig } from '@tickbox/core';
import { AttachmentManager, ConfigError, LocalBucket, createDb, loadConfig } from '@tickbox/core';
import * as out from './output.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createEditCommand } from './commands/edit.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createTimeCommand } from './commands/time.js';
import { createDeleteCommand } from './commands/delete.js';
import { createCategoriesCommand } from './commands/categories.js';
import { createTagsCommand } from './commands/tags.js';
import { createSubtaskCommand } from './commands/subtask.js';
import {
  createAttachCommand, createAttachmentsCommand, createUrlCommand, createDetachCommand,
} from './commands/attach.js';

function loadConfigOrExit(): TickboxConfig {
  try {
    return loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      out.error(err.message);
      out.info('Set the variables in the environment or in a .env file (see .env.example).');
      process.exit(1);
    }
    throw err;
  }
}

// Configuration problems are fatal before any command runs
const config = loadConfigOrExit();
const db = createDb(config.databasePath);

const bucket = new LocalBucket(config.storageDir, config.bucketName, config.accessKey);
const attachments = new AttachmentManager(db, bucket, {
  maxFileSizeBytes: config.maxFileSizeBytes,
  signedUrlTtlSeconds: config.signedUrlTtlSeconds,
});

const program = new Command()
  .name('tickbox')
  .description('Todo lists with categories, tags, subtasks and attachments')
  .version('1.0.0');

program.addCommand(createAddCommand(db));
program.addCommand(createListCommand(db));
program.addCommand(createShowCommand(db));
program.addCommand(createEditCommand(db));
program.addCommand(createCheckCommand(db));
program.addCommand(createUncheckCommand(db));
program.addCommand(createTimeCommand(db));
program.addCommand(createDeleteCommand(attachments));
program.addCommand(createCategoriesCommand(db));
program.addCommand(createTagsCommand(db));
program.addCommand(createSubtaskCommand(db));
program.addCommand(createAttachCommand(attachments));
program.addCommand(createAttachmentsCommand(db));
program.addCommand(createUrlCommand(attachments));
program.addCommand(createDetachCommand(attachments));

// Default action (no command): show the todo list
program.action(async (_opts: unknown, cmd: Command) => {
  await cmd.commands.find(c => c.name() === 'list')?.parseAsync([], { from: 'user' });
});

await program.parseAsync();
