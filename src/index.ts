/**
 * OAuth2 Client Auto-Configuration
 *
 * Resolves OAuth 2.0 / OpenID Connect client registrations from configuration
 * properties and provider templates, and registers them with the host
 * application when at least one client is configured.
 */

import { registerClientRegistrationRepository, registerOAuth2Login } from './lib/autoconfigure.ts';
import type { AutoConfigurationOptions } from './lib/autoconfigure.ts';
import type { PropertySource } from './lib/config.ts';
import type { OAuth2Login } from './lib/login.ts';
import type { ClientRegistrationRepository, ComponentRegistry } from './types.ts';

export {
	CLIENT_REGISTRATIONS_PROPERTY_PREFIX,
	PropertySource,
	bindClientRegistrations,
	expandEnvVar,
	loadPropertySource,
} from './lib/config.ts';
export { clientsConfigured, getConfiguredRegistrationIds, hasConfiguredClients } from './lib/condition.ts';
export type { ConditionOutcome } from './lib/condition.ts';
export {
	InMemoryClientRegistrationRepository,
	applyTemplateDefaults,
	resolve,
	resolveClientRegistrations,
} from './lib/registrations.ts';
export {
	CLIENT_REGISTRATION_REPOSITORY,
	OAUTH2_LOGIN,
	isClientRegistrationRepository,
	registerClientRegistrationRepository,
	registerOAuth2Login,
} from './lib/autoconfigure.ts';
export type { AutoConfigurationOptions } from './lib/autoconfigure.ts';
export { OAuth2Login, createJwksSigningKeySource } from './lib/login.ts';
export type { OAuth2LoginOptions, RedirectUriContext, SigningKeySource, SigningKeySourceFactory } from './lib/login.ts';
export {
	DEFAULT_REDIRECT_URI,
	createTemplateCatalog,
	getTemplate,
	getTemplateNames,
	templates,
} from './lib/templates/index.ts';
export type * from './types.ts';

export interface OAuth2ClientConfiguration {
	repository?: ClientRegistrationRepository;
	login?: OAuth2Login;
}

/**
 * Configure OAuth2 client support in a component registry
 *
 * Components the application registered beforehand under
 * `clientRegistrationRepository` or `oauth2Login` are kept.
 *
 * @example
 * ```typescript
 * const source = await loadPropertySource('config.yaml');
 * const components = new Map<string, unknown>();
 * const { repository } = configureOAuth2Clients(components, source, { logger: console });
 * repository?.findByRegistrationId('google');
 * ```
 */
export function configureOAuth2Clients(
	registry: ComponentRegistry,
	source: PropertySource,
	options: AutoConfigurationOptions = {}
): OAuth2ClientConfiguration {
	const repository = registerClientRegistrationRepository(registry, source, options);
	if (!repository) {
		options.logger?.info?.('No OAuth2 clients configured, client support disabled');
		return {};
	}

	return { repository, login: registerOAuth2Login(registry, options) };
}
