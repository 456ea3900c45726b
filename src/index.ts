#!/usr/bin/env node
import path from 'node:path';
import os from 'node:os';
import { promises as fs } from 'node:fs';

import { checkbox, input, select } from '@inquirer/prompts';

import { createSmartFiles } from './application/smart-files';
import type { SmartFiles } from './application/smart-files';
import { loadConfig } from './config/app-config';
import type { AppConfig } from './config/app-config';
import { groupByCategory } from './domain/file-category';
import type { DuplicateReport, FileDescriptor } from './domain/file-descriptor';
import type { SearchMode } from './domain/search-criteria';
import { formatBytes } from './utils/format-bytes';
import { getLogger } from './utils/get-logger';
import { parseSize } from './utils/parse-size-threshold';
import { parseArgs } from './utils/parse-args';
import type { ParsedArgs } from './utils/parse-args';
import { TUIProgress } from './utils/tui-progress';

type CommandContext = {
  smartFiles: SmartFiles;
  config: AppConfig;
  args: ParsedArgs;
  interactive: boolean;
  signal: AbortSignal;
};

const COMMANDS = [
  'ls',
  'search',
  'digest',
  'duplicates',
  'large',
  'old',
  'open',
  'recent',
  'frequent',
  'suggest',
  'df',
] as const;

type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command => COMMANDS.some((command) => command === value);

const logger = getLogger();

const main = async (signal: AbortSignal) => {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help' || args.command === '--help') {
    printHelp();
    return;
  }

  const config = loadConfig();
  const smartFiles = createSmartFiles({
    historyPath: config.historyPath,
    duplicateDefaults: {
      algorithm: config.hashAlgorithm,
      minSizeBytes: config.duplicateMinSizeBytes,
      concurrency: config.digestConcurrency,
    },
  });

  if (process.stdin.isTTY && !args.command) {
    const operation = await select<Command | 'help'>({
      message: 'What would you like to do?',
      choices: [
        { name: 'Duplicates - Find files with identical content', value: 'duplicates' },
        { name: 'Large files - Find the biggest files', value: 'large' },
        { name: 'Old files - Find files not modified for a long time', value: 'old' },
        { name: 'Search - Find files by name, extension or content', value: 'search' },
        { name: 'List - Show a directory', value: 'ls' },
        { name: 'Recent - Recently opened items', value: 'recent' },
        { name: 'Frequent - Most opened items', value: 'frequent' },
        { name: 'Suggest - Items related to a directory', value: 'suggest' },
        { name: 'Help - Show usage information', value: 'help' },
      ],
    });

    if (operation === 'help') {
      printHelp();
      return;
    }

    const interactiveArgs = await promptForArguments(operation, args);
    await runCommand(operation, { smartFiles, config, args: interactiveArgs, interactive: true, signal });
    return;
  }

  if (!args.command || !isCommand(args.command)) {
    if (args.command) {
      logger.error({ command: args.command }, 'Unknown command');
    }
    printHelp();
    return;
  }

  await runCommand(args.command, { smartFiles, config, args, interactive: false, signal });
};

const runCommand = async (command: Command, context: CommandContext) => {
  switch (command) {
    case 'ls':
      return runList(context);
    case 'search':
      return runSearch(context);
    case 'digest':
      return runDigest(context);
    case 'duplicates':
      return runDuplicates(context);
    case 'large':
    case 'old':
      return runSizeAgeScan(command, context);
    case 'open':
      return runOpen(context);
    case 'recent':
      return printDescriptors('Recent items', await context.smartFiles.recentItems(), context.args.outputPath);
    case 'frequent':
      return printDescriptors(
        'Frequent items',
        await context.smartFiles.frequentItems(context.args.limit),
        context.args.outputPath,
      );
    case 'suggest':
      return printDescriptors(
        'Suggestions',
        await context.smartFiles.contextualSuggestions(targetPath(context.args), context.args.limit),
        context.args.outputPath,
      );
    case 'df':
      return runDiskSpace(context);
  }
};

const runList = async ({ smartFiles, args }: CommandContext) => {
  const result = await smartFiles.listDirectory(targetPath(args));
  if (!result.ok) {
    logger.error({ code: result.error.code, path: result.error.path }, result.error.message);
    process.exitCode = 1;
    return;
  }
  await printDescriptors(targetPath(args), result.value, args.outputPath);
  // listing a directory counts as navigating into it
  await smartFiles.recordAccess(targetPath(args));
};

const runSearch = async ({ smartFiles, args, signal }: CommandContext) => {
  const progress = createProgress('Smart Files - Searching');
  const results = await smartFiles.search(
    targetPath(args),
    {
      keyword: args.keyword,
      searchMode: args.mode,
      caseSensitive: args.caseSensitive,
      minSizeBytes: args.minSizeBytes ?? 0,
      maxSizeBytes: args.maxSizeBytes ?? 0,
      minAgeDays: args.minAgeDays ?? 0,
    },
    { signal, progress: progress ?? undefined },
  );
  progress?.finalize();
  await printDescriptors(`Search results for "${args.keyword}"`, results, args.outputPath);
};

const runDigest = async ({ smartFiles, args, config }: CommandContext) => {
  const filePath = targetPath(args);
  const digest = await smartFiles.digest(filePath, { algorithm: args.algorithm ?? config.hashAlgorithm });
  if (!digest) {
    logger.error({ path: filePath }, 'Could not read file');
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${digest}  ${filePath}\n`);
};

const runDuplicates = async (context: CommandContext) => {
  const { smartFiles, args, signal } = context;
  const root = targetPath(args);
  const progress = createProgress('Smart Files - Duplicate Scan');
  const report = await smartFiles.duplicateReport(root, {
    ...(args.algorithm ? { algorithm: args.algorithm } : {}),
    ...(args.minSizeBytes !== undefined ? { minSizeBytes: args.minSizeBytes } : {}),
    signal,
    progress: progress ?? undefined,
  });
  progress?.finalize();

  await writeOutput(args.outputPath, report);
  printDuplicateSummary(report);

  if (context.interactive && report.groups.length > 0) {
    // the first member of each group is the one kept by default
    const choices = report.groups.flatMap((group) =>
      group.paths.map((filePath, index) => ({
        value: filePath,
        name: `${formatBytes(group.sizeBytes)} ${filePath}`,
        checked: index > 0,
      })),
    );
    await promptForDeletion(context, choices);
  }
};

const runSizeAgeScan = async (command: 'large' | 'old', context: CommandContext) => {
  const { smartFiles, args, signal } = context;
  const root = targetPath(args);
  const progress = createProgress(command === 'large' ? 'Smart Files - Large Files' : 'Smart Files - Old Files');
  const options = { signal, progress: progress ?? undefined, limit: args.limit };
  const results =
    command === 'large'
      ? await smartFiles.findLargeFiles(root, { ...options, minSizeBytes: args.minSizeBytes })
      : await smartFiles.findOldFiles(root, { ...options, minAgeDays: args.minAgeDays });
  progress?.finalize();

  await printDescriptors(command === 'large' ? 'Large files' : 'Old files', results, args.outputPath);

  if (context.interactive && results.length > 0) {
    const choices = results.map((item) => ({
      value: item.path,
      name: `${item.formattedSize ?? ''} ${item.path}`,
      checked: false,
    }));
    await promptForDeletion(context, choices);
  }
};

const runOpen = async ({ smartFiles, args }: CommandContext) => {
  const itemPath = targetPath(args);
  const descriptor = await smartFiles.resolve(itemPath);
  if (!descriptor) {
    logger.error({ path: itemPath }, 'Path does not exist');
    process.exitCode = 1;
    return;
  }
  await smartFiles.recordAccess(descriptor.path);
  logger.info({ path: descriptor.path }, 'Access recorded');
};

const runDiskSpace = async ({ smartFiles, args }: CommandContext) => {
  const result = await smartFiles.diskSpace(targetPath(args));
  if (!result.ok) {
    logger.error({ code: result.error.code }, result.error.message);
    process.exitCode = 1;
    return;
  }
  const { totalBytes, freeBytes } = result.value;
  process.stdout.write(
    `Total: ${formatBytes(totalBytes)}\nFree: ${formatBytes(freeBytes)}\nUsed: ${formatBytes(totalBytes - freeBytes)}\n`,
  );
};

const promptForDeletion = async (
  { smartFiles }: CommandContext,
  choices: Array<{ value: string; name: string; checked: boolean }>,
) => {
  // keep log lines out of the prompt while it is on screen
  const originalLevel = logger.level;
  logger.level = 'silent';

  let selected: string[];
  try {
    selected = await checkbox({
      message: 'Select items to delete (Space: toggle, Enter: done)',
      choices,
      pageSize: 20,
      loop: false,
      required: false,
    });
  } finally {
    logger.level = originalLevel;
  }

  if (selected.length === 0) {
    logger.info('No items selected.');
    return;
  }

  const confirm = await select({
    message: `Delete ${selected.length} items?`,
    choices: [
      { name: 'Yes, delete selected items', value: 'yes' },
      { name: 'No, cancel', value: 'no' },
    ],
  });
  if (confirm !== 'yes') {
    return;
  }

  const results = await smartFiles.deleteItems(selected);
  for (const { path: itemPath, result } of results) {
    if (result.ok) {
      process.stdout.write(`  deleted ${itemPath}\n`);
    } else {
      process.stdout.write(`  failed  ${itemPath}: ${result.error.message}\n`);
    }
  }
};

const promptForArguments = async (command: Command, args: ParsedArgs): Promise<ParsedArgs> => {
  if (command === 'recent' || command === 'frequent') {
    return args;
  }

  const location = await input({
    message: command === 'ls' || command === 'suggest' ? 'Directory' : 'Root directory to scan',
    default: process.cwd(),
  });
  const next: ParsedArgs = { ...args, positional: [location] };

  if (command === 'search') {
    next.keyword = await input({ message: 'Keyword' });
    next.mode = await select<SearchMode>({
      message: 'Search by',
      choices: [
        { name: 'Name', value: 'name' },
        { name: 'Extension', value: 'extension' },
        { name: 'Content', value: 'content' },
      ],
    });
  }

  if (command === 'duplicates' || command === 'large') {
    const minSize = await input({
      message: 'Minimum file size',
      default: command === 'large' ? '100MB' : '1MB',
      validate: (value) => parseSize(value) !== undefined || 'Use a size such as 500KB, 10MB or 1GB',
    });
    next.minSizeBytes = parseSize(minSize);
  }

  if (command === 'old') {
    const days = await input({
      message: 'Minimum age in days',
      default: '365',
      validate: (value) => /^\d+$/.test(value.trim()) || 'Enter a whole number of days',
    });
    next.minAgeDays = Number.parseInt(days, 10);
  }

  return next;
};

const targetPath = (args: ParsedArgs) => path.resolve(resolveHome(args.positional[0] ?? process.cwd()));

const resolveHome = (targetPath: string) => {
  if (targetPath.startsWith('~')) {
    return path.join(os.homedir(), targetPath.slice(1));
  }
  return targetPath;
};

const createProgress = (title: string): TUIProgress | null => {
  if (!process.stdout.isTTY) {
    return null;
  }
  const progress = new TUIProgress(title);
  progress.clear();
  return progress;
};

const writeOutput = async (outputPath: string | null, payload: unknown) => {
  if (!outputPath) {
    return;
  }
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(payload, null, 2), 'utf8');
  logger.info({ outputPath }, 'Results written');
};

const printDescriptors = async (title: string, items: FileDescriptor[], outputPath: string | null) => {
  await writeOutput(outputPath, items);

  if (items.length === 0) {
    process.stdout.write(`\n${title}: (none)\n`);
    return;
  }

  const totalSize = items.reduce((sum, item) => sum + item.sizeBytes, 0);
  const totals = Array.from(groupByCategory(items).entries())
    .map(([category, members]) => `${category}: ${members.length}`)
    .join(', ');
  const lines = items.map((item) => {
    const size = item.formattedSize ?? '';
    const modified = item.modifiedAt.toISOString().slice(0, 16).replace('T', ' ');
    return `  ${item.icon} ${size.padStart(10)}  ${modified}  ${item.path}`;
  });

  process.stdout.write(`
${title}
${lines.join('\n')}

Items: ${items.length}, Size: ${formatBytes(totalSize)}
Categories: ${totals}
`);
};

const printDuplicateSummary = (report: DuplicateReport) => {
  const groups = report.groups.map((group) => {
    const members = group.paths.map((filePath) => `    - ${filePath}`).join('\n');
    return `  ${group.digest} (${formatBytes(group.sizeBytes)} x ${group.paths.length})\n${members}`;
  });

  process.stdout.write(`
Duplicate scan summary
Root: ${report.root}
Files scanned: ${report.filesScanned}
Files hashed: ${report.filesHashed}
Unreadable: ${report.hashErrors}
Duplicate groups: ${report.groups.length}
Reclaimable: ${formatBytes(report.wastedBytes)}

${groups.join('\n\n') || '  (no duplicates)'}
`);
};

const printHelp = () => {
  const message = `
smart-files

Usage:
  smart-files [command] [path] [options]

  If no command is specified and running in TTY, you'll be prompted to choose.

Commands:
  ls <path>           - List a directory (directories first)
  search <root>       - Search by name, extension or content
  digest <file>       - Print the content digest of a file
  duplicates <root>   - Find files with identical content
  large <root>        - Find the largest files
  old <root>          - Find files not modified for a long time
  open <path>         - Record an access to a path
  recent              - Recently accessed items
  frequent            - Most frequently accessed items
  suggest <path>      - Items likely relevant to a directory
  df <path>           - Disk space of the volume holding a path

Options:
  --output, -o <path>   Write results as JSON
  --keyword, -k <text>  Search keyword
  --mode <mode>         name | extension | content (default: name)
  --case-sensitive      Case-sensitive search
  --min-size <size>     Minimum file size, e.g. 10MB
  --max-size <size>     Maximum file size (search only)
  --min-age <days>      Minimum age in days by modification time
  --limit <n>           Maximum number of results
  --algorithm <alg>     md5 | sha1 | sha256

Environment:
  SMART_FILES_HISTORY       Access history file
  SMART_FILES_HASH          Default digest algorithm (md5)
  SMART_FILES_CONCURRENCY   Files digested in parallel (4)
  SKIP_ITEMS_SMALLER_THAN   Default duplicate size floor (1MB)
  LOG_LEVEL                 Log level (info)

Examples:
  smart-files                                # Interactive mode
  smart-files duplicates ~/Downloads --min-size 10MB
  smart-files large ~ --limit 20
  smart-files search ~/notes -k todo --mode content
`;

  process.stdout.write(message);
};

// ExitPromptError is what the prompts throw on Ctrl+C
const isAbortError = (error: unknown) =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'ExitPromptError');

const run = async () => {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    await main(controller.signal);
  } catch (error) {
    if (isAbortError(error)) {
      logger.warn('Scan cancelled');
      process.exitCode = 130;
      return;
    }
    logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
};

void run();
