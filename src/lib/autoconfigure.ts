/**
 * OAuth2 Client Auto-Configuration
 *
 * Registers the client registration repository and login support in the
 * host's component registry, unless the application supplies its own.
 */

import { bindClientRegistrations, CLIENT_REGISTRATIONS_PROPERTY_PREFIX } from './config.ts';
import type { PropertySource } from './config.ts';
import { clientsConfigured } from './condition.ts';
import { resolveClientRegistrations } from './registrations.ts';
import { OAuth2Login } from './login.ts';
import type { SigningKeySourceFactory } from './login.ts';
import { templates } from './templates/index.ts';
import type { ClientRegistrationRepository, ComponentRegistry, Logger, TemplateCatalog } from '../types.ts';

/** Component name of the client registration repository */
export const CLIENT_REGISTRATION_REPOSITORY = 'clientRegistrationRepository';

/** Component name of the login configuration */
export const OAUTH2_LOGIN = 'oauth2Login';

export interface AutoConfigurationOptions {
	/** Templates to default registrations from (built-in catalog by default) */
	catalog?: TemplateCatalog;
	/** Property prefix of the registrations map */
	prefix?: string;
	logger?: Logger;
	signingKeys?: SigningKeySourceFactory;
}

export function isClientRegistrationRepository(value: unknown): value is ClientRegistrationRepository {
	return (
		typeof value === 'object' &&
		value !== null &&
		'findByRegistrationId' in value &&
		typeof value.findByRegistrationId === 'function'
	);
}

/**
 * Register the client registration repository
 *
 * - A repository the application already registered wins; nothing is resolved.
 * - Without any registration that has a client id, nothing is registered.
 *
 * @returns The repository active after this call, if any
 */
export function registerClientRegistrationRepository(
	registry: ComponentRegistry,
	source: PropertySource,
	options: AutoConfigurationOptions = {}
): ClientRegistrationRepository | undefined {
	const { logger, catalog = templates, prefix = CLIENT_REGISTRATIONS_PROPERTY_PREFIX } = options;

	if (registry.has(CLIENT_REGISTRATION_REPOSITORY)) {
		const existing = registry.get(CLIENT_REGISTRATION_REPOSITORY);
		if (!isClientRegistrationRepository(existing)) {
			throw new Error(`Component '${CLIENT_REGISTRATION_REPOSITORY}' is not a client registration repository`);
		}
		logger?.debug?.('Using application supplied client registration repository');
		return existing;
	}

	const outcome = clientsConfigured(source, prefix);
	logger?.debug?.(outcome.message);
	if (!outcome.match) {
		return undefined;
	}

	const repository = resolveClientRegistrations(catalog, bindClientRegistrations(source, prefix), logger);
	registry.set(CLIENT_REGISTRATION_REPOSITORY, repository);
	logger?.info?.(`OAuth2 client registrations ready: ${repository.getRegistrationIds().join(', ')}`);

	return repository;
}

/**
 * Register login support over the active client registration repository
 *
 * Backs off when there is no repository. A login configuration the
 * application registered (an `OAuth2Login` built with its own options) wins.
 *
 * @returns The login configuration active after this call, if any
 */
export function registerOAuth2Login(
	registry: ComponentRegistry,
	options: AutoConfigurationOptions = {}
): OAuth2Login | undefined {
	const { logger, signingKeys } = options;

	if (registry.has(OAUTH2_LOGIN)) {
		const existing = registry.get(OAUTH2_LOGIN);
		if (!(existing instanceof OAuth2Login)) {
			throw new Error(`Component '${OAUTH2_LOGIN}' is not an OAuth2 login configuration`);
		}
		logger?.debug?.('Using application supplied OAuth2 login configuration');
		return existing;
	}

	const repository = registry.get(CLIENT_REGISTRATION_REPOSITORY);
	if (!isClientRegistrationRepository(repository)) {
		return undefined;
	}

	const login = new OAuth2Login(repository, { logger, signingKeys });
	registry.set(OAUTH2_LOGIN, login);
	return login;
}
