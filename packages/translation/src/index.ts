export interface Translator {
	/**
	 * The human-readable name of the translator.
	 */
	name: string;
	/**
	 * Translate one string. Implementations throw {@link ProviderError} on
	 * network, quota or service failures.
	 */
	translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string>;
	/**
	 * Best-effort language detection over a handful of sample strings.
	 * Resolves `undefined` when the language cannot be determined.
	 */
	detectLanguage(samples: string[]): Promise<string | undefined>;
	/**
	 * Optional cleanup hook invoked when a worker is done with its instance.
	 */
	dispose?(): Promise<void> | void;
}

/**
 * Builds a fresh translator. Called once per concurrent worker; instances are
 * never shared between workers.
 */
export type TranslatorFactory = () => Translator | Promise<Translator>;

export interface TranslatorFactoryOptions {
	provider: string;
	apiKey?: string;
	secret?: string;
	timeoutMs?: number;
	config?: Record<string, unknown>;
}

export interface TranslatorLoadOptions extends TranslatorFactoryOptions {
	module?: string;
}

export interface TranslatorModule {
	createTranslator?: (options: TranslatorFactoryOptions) => Translator | Promise<Translator>;
	default?: unknown;
}

export class TranslatorLoadError extends Error {
	constructor(message: string, public readonly cause?: unknown) {
		super(message);
		this.name = 'TranslatorLoadError';
	}
}

export interface ProviderErrorOptions {
	provider: string;
	status?: number;
	retryable?: boolean;
	cause?: unknown;
}

export class ProviderError extends Error {
	public readonly provider: string;
	public readonly status?: number;
	public readonly retryable: boolean;
	public readonly cause?: unknown;

	constructor(message: string, options: ProviderErrorOptions) {
		super(message);
		this.name = 'ProviderError';
		this.provider = options.provider;
		this.status = options.status;
		this.retryable = options.retryable ?? true;
		this.cause = options.cause;
	}

	get rateLimited(): boolean {
		return this.status === 429;
	}
}

export const buildTranslatorModuleSpecifier = (provider: string): string => {
	if (!provider || provider === '.') {
		throw new TranslatorLoadError('Translator provider name is required.');
	}

	if (provider.startsWith('.') || provider.startsWith('/') || provider.includes('/')) {
		return provider;
	}

	return `@transjson/translator-${provider}`;
};

/**
 * Resolve a provider module and return a factory that builds one independent
 * translator per call.
 */
export async function loadTranslatorFactory(options: TranslatorLoadOptions): Promise<TranslatorFactory> {
	const specifier = options.module && options.module.trim().length
		? options.module
		: buildTranslatorModuleSpecifier(options.provider);

	let mod: TranslatorModule;
	try {
		mod = (await import(specifier)) as TranslatorModule;
	} catch (error) {
		const cause = error instanceof Error ? error : undefined;
		const isBuiltIn = specifier.startsWith('@transjson/translator-');
		const hint = isBuiltIn
			? `Built-in providers ship with @transjson/cli. Reinstall it or add the package: npm install ${specifier}`
			: `Install the adapter: npm install ${specifier}`;
		throw new TranslatorLoadError(`Unable to load translator module "${specifier}". ${hint}`, cause);
	}

	const create = resolveCreateTranslator(mod);
	if (!create) {
		throw new TranslatorLoadError(`Translator module "${specifier}" does not export createTranslator().`);
	}

	const factoryOptions: TranslatorFactoryOptions = {
		provider: options.provider,
		apiKey: options.apiKey,
		secret: options.secret,
		timeoutMs: options.timeoutMs,
		config: options.config,
	};

	return async () => {
		const translator = await create(factoryOptions);
		if (!isTranslator(translator)) {
			throw new TranslatorLoadError(`Translator module "${specifier}" did not produce a valid translator.`);
		}
		return translator;
	};
}

function resolveCreateTranslator(moduleExports: TranslatorModule): TranslatorModule['createTranslator'] {
	if (typeof moduleExports.createTranslator === 'function') {
		return moduleExports.createTranslator;
	}

	const fallback = moduleExports.default;
	if (fallback && typeof fallback === 'object' && 'createTranslator' in fallback) {
		const candidate = fallback.createTranslator;
		if (typeof candidate === 'function') {
			return (options) => candidate(options);
		}
	}

	return undefined;
}

export function isTranslator(value: unknown): value is Translator {
	if (!value || typeof value !== 'object') {
		return false;
	}
	return (
		'translate' in value &&
		typeof value.translate === 'function' &&
		'detectLanguage' in value &&
		typeof value.detectLanguage === 'function'
	);
}
