import type {LibraryConfig} from '../config/index.js';
import {EMBEDDING_API_KEY_ENVS} from '../constants.js';
import {MockEmbeddingProvider} from './mock.js';
import {OpenAIEmbeddingProvider} from './openai.js';
import type {EmbeddingProvider} from './types.js';

export type {EmbeddingProvider} from './types.js';
export {MockEmbeddingProvider} from './mock.js';
export {OpenAIEmbeddingProvider, type OpenAIEmbeddingOptions} from './openai.js';

/**
 * First non-empty API key from the environment, if any.
 */
export function readEmbeddingApiKey(): string | undefined {
	for (const name of EMBEDDING_API_KEY_ENVS) {
		const value = process.env[name]?.trim();
		if (value) return value;
	}
	return undefined;
}

/**
 * Create the embedding provider named by the config.
 */
export function createEmbeddingProvider(
	config: Pick<
		LibraryConfig,
		| 'embeddingProvider'
		| 'embeddingModel'
		| 'embeddingDimensions'
		| 'embeddingBaseUrl'
	>,
): EmbeddingProvider {
	switch (config.embeddingProvider) {
		case 'openai':
			return new OpenAIEmbeddingProvider({
				apiKey: readEmbeddingApiKey(),
				baseUrl: config.embeddingBaseUrl,
				model: config.embeddingModel,
				dimensions: config.embeddingDimensions,
			});
		case 'mock':
			return new MockEmbeddingProvider(config.embeddingDimensions);
	}
}
