import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to the real library.
process.env['BOOKSHELF_HOME'] =
	process.env['BOOKSHELF_HOME'] ??
	path.join(os.tmpdir(), `bookshelf-test-home-${process.pid}`);

// Never call an embedding service in tests; forked workers inherit this.
process.env['BOOKSHELF_EMBEDDING_PROVIDER'] = 'mock';
