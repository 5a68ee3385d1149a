/**
 * Client Registration Resolution
 *
 * Merges configured registrations with provider templates and builds the
 * registration repository.
 */

import { getTemplate } from './templates/index.ts';
import { hasConfiguredClients } from './condition.ts';
import type {
	AuthorizationGrantType,
	ClientAuthenticationMethod,
	ClientRegistration,
	ClientRegistrationRepository,
	ClientTemplate,
	Logger,
	RawClientRegistration,
	RawClientRegistrations,
	TemplateCatalog,
} from '../types.ts';

const clientAuthenticationMethodMappings: ReadonlyMap<string, ClientAuthenticationMethod> = new Map<
	string,
	ClientAuthenticationMethod
>([
	['basic', 'client_secret_basic'],
	['post', 'client_secret_post'],
]);

const authorizationGrantTypeMappings: ReadonlyMap<string, AuthorizationGrantType> = new Map<
	string,
	AuthorizationGrantType
>([['authorization_code', 'authorization_code']]);

function isEmpty(value: string | readonly string[] | undefined): boolean {
	return value === undefined || value.length === 0;
}

function defaultValue<T extends string | readonly string[]>(value: T | undefined, templateValue: T | undefined): T | undefined {
	return isEmpty(value) && !isEmpty(templateValue) ? templateValue : value;
}

/**
 * Apply template defaults to a registration
 *
 * Each attribute that is absent or empty on the registration takes the
 * template's value, if the template has a non-empty one. Configured values
 * always win. Neither argument is modified.
 */
export function applyTemplateDefaults(
	registration: RawClientRegistration,
	template: ClientTemplate
): RawClientRegistration {
	const scope = defaultValue(registration.scope, template.scope);

	return {
		...registration,
		clientAuthenticationMethod: defaultValue(registration.clientAuthenticationMethod, template.clientAuthenticationMethod),
		authorizationGrantType: defaultValue(registration.authorizationGrantType, template.authorizationGrantType),
		redirectUri: defaultValue(registration.redirectUri, template.redirectUri),
		scope: scope && [...scope],
		authorizationUri: defaultValue(registration.authorizationUri, template.authorizationUri),
		tokenUri: defaultValue(registration.tokenUri, template.tokenUri),
		userInfoUri: defaultValue(registration.userInfoUri, template.userInfoUri),
		jwkSetUri: defaultValue(registration.jwkSetUri, template.jwkSetUri),
		clientName: defaultValue(registration.clientName, template.clientName),
		clientAlias: defaultValue(registration.clientAlias, template.clientAlias),
	};
}

/**
 * Map a bound enum value through a lookup table
 *
 * Unmapped values resolve to null rather than failing the registration.
 * TODO: reject unmapped values once existing configurations have been
 * audited; today a typo yields a registration without that setting.
 */
function mapEnum<T>(
	mappings: ReadonlyMap<string, T>,
	value: string | undefined,
	attribute: string,
	registrationId: string,
	logger?: Logger
): T | null {
	if (!value) return null;

	const mapped = mappings.get(value);
	if (mapped === undefined) {
		logger?.warn?.(`Client registration '${registrationId}' has unsupported ${attribute} '${value}'`);
		return null;
	}
	return mapped;
}

function toClientRegistration(
	registrationId: string,
	clientId: string,
	properties: RawClientRegistration,
	logger?: Logger
): ClientRegistration {
	return Object.freeze({
		registrationId,
		clientId,
		clientSecret: properties.clientSecret,
		clientAuthenticationMethod: mapEnum(
			clientAuthenticationMethodMappings,
			properties.clientAuthenticationMethod,
			'client authentication method',
			registrationId,
			logger
		),
		authorizationGrantType: mapEnum(
			authorizationGrantTypeMappings,
			properties.authorizationGrantType,
			'authorization grant type',
			registrationId,
			logger
		),
		redirectUri: properties.redirectUri,
		scope: new Set(properties.scope ?? []),
		providerDetails: Object.freeze({
			authorizationUri: properties.authorizationUri,
			tokenUri: properties.tokenUri,
			userInfoUri: properties.userInfoUri,
			jwkSetUri: properties.jwkSetUri,
		}),
		clientName: properties.clientName,
	});
}

/**
 * In-memory Client Registration Repository
 *
 * Keeps registrations in insertion order. Registration ids are unique.
 */
export class InMemoryClientRegistrationRepository implements ClientRegistrationRepository, Iterable<ClientRegistration> {
	private readonly registrations = new Map<string, ClientRegistration>();

	constructor(registrations: Iterable<ClientRegistration>) {
		for (const registration of registrations) {
			if (this.registrations.has(registration.registrationId)) {
				throw new Error(`Duplicate client registration id '${registration.registrationId}'`);
			}
			this.registrations.set(registration.registrationId, registration);
		}
	}

	findByRegistrationId(registrationId: string): ClientRegistration | undefined {
		return this.registrations.get(registrationId);
	}

	getRegistrationIds(): string[] {
		return [...this.registrations.keys()];
	}

	get size(): number {
		return this.registrations.size;
	}

	[Symbol.iterator](): Iterator<ClientRegistration> {
		return this.registrations.values();
	}
}

/**
 * Resolve raw registrations against a template catalog
 *
 * Registrations without a client id are left out.
 */
export function resolveClientRegistrations(
	catalog: TemplateCatalog,
	registrations: RawClientRegistrations,
	logger?: Logger
): InMemoryClientRegistrationRepository {
	const resolved: ClientRegistration[] = [];

	for (const [registrationId, registration] of Object.entries(registrations)) {
		// Without an explicit template, use the one named like the registration
		const templateId = registration.templateId ?? registrationId;
		const template = getTemplate(templateId, catalog);
		const properties = template ? applyTemplateDefaults(registration, template) : registration;

		const clientId = properties.clientId;
		if (!clientId) {
			logger?.debug?.(`Client registration '${registrationId}' has no client-id, skipping`);
			continue;
		}

		resolved.push(toClientRegistration(registrationId, clientId, properties, logger));
	}

	return new InMemoryClientRegistrationRepository(resolved);
}

/**
 * Resolve registrations if any are configured
 *
 * Returns undefined when no registration has a client id; callers may then
 * fall back to a repository of their own.
 */
export function resolve(
	catalog: TemplateCatalog,
	registrations: RawClientRegistrations,
	logger?: Logger
): InMemoryClientRegistrationRepository | undefined {
	if (!hasConfiguredClients(registrations)) {
		return undefined;
	}
	return resolveClientRegistrations(catalog, registrations, logger);
}
