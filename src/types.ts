/**
 * OAuth2 Client Auto-Configuration Type Definitions
 */

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Attributes a provider template can supply to a client registration
 *
 * Enumerated values (authentication method, grant type) hold the bound
 * configuration value, normalized to lower case with underscores.
 */
export interface ClientRegistrationDefaults {
	/** e.g. 'basic' or 'post' */
	clientAuthenticationMethod?: string;
	/** e.g. 'authorization_code' */
	authorizationGrantType?: string;
	/** Redirect URI template, may contain `{registrationId}` style placeholders */
	redirectUri?: string;
	scope?: readonly string[];
	authorizationUri?: string;
	tokenUri?: string;
	userInfoUri?: string;
	jwkSetUri?: string;
	/** Human readable name shown on login pages */
	clientName?: string;
	clientAlias?: string;
}

/**
 * Client Template
 * Pre-shipped defaults for a well-known provider (Google, GitHub, ...)
 */
export type ClientTemplate = Readonly<ClientRegistrationDefaults>;

/**
 * Template Catalog
 * Template name -> template. Looked up case-insensitively.
 */
export type TemplateCatalog = Readonly<Record<string, ClientTemplate>>;

/**
 * Raw Client Registration
 * One configured registration as bound from properties, before defaulting.
 * An absent field is `undefined`; an empty one is `''` or `[]`.
 */
export interface RawClientRegistration extends ClientRegistrationDefaults {
	clientId?: string;
	clientSecret?: string;
	/** Template to draw defaults from; the registration id is used when absent */
	templateId?: string;
}

/**
 * Raw registrations keyed by registration id (case-sensitive)
 */
export type RawClientRegistrations = Readonly<Record<string, RawClientRegistration>>;

// ============================================================================
// Resolved Registration Types
// ============================================================================

/** Client authentication methods understood by the OAuth2 client */
export type ClientAuthenticationMethod = 'client_secret_basic' | 'client_secret_post';

/** Authorization grant types understood by the OAuth2 client */
export type AuthorizationGrantType = 'authorization_code';

/**
 * Provider endpoints of a resolved registration
 */
export interface ProviderDetails {
	readonly authorizationUri?: string;
	readonly tokenUri?: string;
	readonly userInfoUri?: string;
	/** JWK set used to verify ID token signatures (OIDC only) */
	readonly jwkSetUri?: string;
}

/**
 * Client Registration
 * Fully defaulted, provider-ready OAuth2 client configuration
 */
export interface ClientRegistration {
	/** Unique within a repository, case-sensitive */
	readonly registrationId: string;
	/** Never empty */
	readonly clientId: string;
	readonly clientSecret?: string;
	/** `null` when the configured method has no mapping */
	readonly clientAuthenticationMethod: ClientAuthenticationMethod | null;
	/** `null` when the configured grant type has no mapping */
	readonly authorizationGrantType: AuthorizationGrantType | null;
	readonly redirectUri?: string;
	readonly scope: ReadonlySet<string>;
	readonly providerDetails: ProviderDetails;
	readonly clientName?: string;
}

/**
 * Client Registration Repository
 * Lookup of resolved registrations by registration id
 */
export interface ClientRegistrationRepository {
	findByRegistrationId(registrationId: string): ClientRegistration | undefined;
}

// ============================================================================
// Host Types
// ============================================================================

/**
 * Component Registry
 * Named components of the host application. A `Map<string, unknown>` fits.
 */
export interface ComponentRegistry {
	has(name: string): boolean;
	get(name: string): unknown;
	set(name: string, component: unknown): unknown;
}

/**
 * Logger Interface
 */
export interface Logger {
	info?: (message: string, ...args: unknown[]) => void;
	error?: (message: string, ...args: unknown[]) => void;
	warn?: (message: string, ...args: unknown[]) => void;
	debug?: (message: string, ...args: unknown[]) => void;
}
