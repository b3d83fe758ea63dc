#!/usr/bin/env node
import path from 'node:path';
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import chalk from 'chalk';
import {
	createServiceLogger,
	formatError,
	getDefaultLibraryDir,
	toError,
} from '../library/index.js';
import App from './app.js';
import {LibrarySession} from './session.js';
import {resolveUserPath} from './commands/handlers.js';
import {
	backgroundIndexCommand,
	booksCommand,
	indexCommand,
	searchCommand,
	statsCommand,
} from './commands/oneshot.js';

const cli = meow(
	`
	Usage
	  $ bookshelf [path]              Index path (optional), then start the interactive search
	  $ bookshelf index <path>        Index a book file or directory
	  $ bookshelf search <query>      Search and print the best matching books
	  $ bookshelf stats               Show database statistics
	  $ bookshelf books               List indexed books

	Options
	  --db, -d <dir>   Library directory (default: $BOOKSHELF_HOME or ~/.local/share/bookshelf/library)
	  --background     With "index": run in a background worker and follow its progress
	  --limit <n>      With "search": number of books to show (default: 5)
	  --help           Show help
	  --version        Show version

	Environment
	  BOOKSHELF_EMBEDDING_PROVIDER   "mock" (default, offline) or "openai"
	  BOOKSHELF_EMBEDDING_API_KEY    API key for "openai" (falls back to OPENAI_API_KEY)

	Examples
	  $ bookshelf ~/Books
	  $ bookshelf search "a sea voyage that goes wrong" --limit 3
`,
	{
		importMeta: import.meta,
		flags: {
			db: {type: 'string', shortFlag: 'd'},
			background: {type: 'boolean', default: false},
			limit: {type: 'number'},
		},
	},
);

const libraryRoot = cli.flags.db ? path.resolve(cli.flags.db) : getDefaultLibraryDir();
const logger = createServiceLogger(libraryRoot, 'cli');
const session = new LibrarySession(libraryRoot, {logger});

async function startRepl(initialPath: string | undefined): Promise<number> {
	if (initialPath) {
		const outcome = await indexCommand(session, resolveUserPath(initialPath));
		if (outcome.status === 'interrupted') {
			console.log(chalk.yellow('Exiting...'));
			return 0;
		}
		console.log();
	}

	const app = render(<App session={session} version={cli.pkg.version ?? '0.0.0'} />, {
		exitOnCtrlC: false, // Double Ctrl+C is handled by the app
	});
	await app.waitUntilExit();
	return 0;
}

async function main(): Promise<number> {
	const [command, ...rest] = cli.input;

	try {
		switch (command) {
			case 'index': {
				const [target] = rest;
				if (!target) {
					cli.showHelp(2);
					return 2;
				}
				if (cli.flags.background) {
					const event = await backgroundIndexCommand(session, resolveUserPath(target));
					return event?.phase === 'error' ? 1 : 0;
				}
				await indexCommand(session, resolveUserPath(target));
				return 0;
			}
			case 'search': {
				const query = rest.join(' ').trim();
				if (!query) {
					cli.showHelp(2);
					return 2;
				}
				await searchCommand(session, query, cli.flags.limit);
				return 0;
			}
			case 'stats':
				await statsCommand(session);
				return 0;
			case 'books':
				await booksCommand(session);
				return 0;
			default:
				return await startRepl(command);
		}
	} finally {
		await session.close();
	}
}

main().then(
	code => {
		process.exitCode = code;
	},
	error => {
		logger.error('Cli', 'Command failed', toError(error));
		console.error(chalk.red(`Error: ${formatError(error)}`));
		process.exitCode = 1;
	},
);
