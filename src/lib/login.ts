/**
 * OAuth2 Login
 *
 * Login support on top of resolved client registrations: redirect URI
 * expansion, authorization request URLs and ID token verification.
 */

import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import jwksClient from 'jwks-rsa';
import type { ClientRegistration, ClientRegistrationRepository, Logger } from '../types.ts';

/**
 * Request details used to expand redirect URI placeholders
 */
export interface RedirectUriContext {
	/** 'http' or 'https' */
	scheme: string;
	serverName: string;
	serverPort: number;
	/** Path the application is mounted under, e.g. '/app' */
	contextPath?: string;
}

/**
 * Source of public keys for ID token signatures
 */
export interface SigningKeySource {
	getSigningKey(kid: string): Promise<{ getPublicKey(): string }>;
}

export type SigningKeySourceFactory = (jwkSetUri: string) => SigningKeySource;

export interface OAuth2LoginOptions {
	logger?: Logger;
	/** Defaults to a cached, rate limited JWKS client per JWK set URI */
	signingKeys?: SigningKeySourceFactory;
}

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 };

/**
 * Create a JWKS backed signing key source
 */
export function createJwksSigningKeySource(jwkSetUri: string): SigningKeySource {
	const client = jwksClient({
		jwksUri: jwkSetUri,
		cache: true, // Cache keys to avoid repeated fetches
		cacheMaxEntries: 5,
		cacheMaxAge: 10 * 60 * 60 * 1000, // 10 hours
		rateLimit: true,
		jwksRequestsPerMinute: 10,
		timeout: 5000,
	});

	return {
		getSigningKey: async (kid: string) => client.getSigningKey(kid),
	};
}

export class OAuth2Login {
	public readonly registrations: ClientRegistrationRepository;
	public logger?: Logger;
	private readonly signingKeys: SigningKeySourceFactory;
	private readonly signingKeySources = new Map<string, SigningKeySource>();

	constructor(registrations: ClientRegistrationRepository, options: OAuth2LoginOptions = {}) {
		this.registrations = registrations;
		this.logger = options.logger;
		this.signingKeys = options.signingKeys ?? createJwksSigningKeySource;
	}

	private getRegistration(registrationId: string): ClientRegistration {
		const registration = this.registrations.findByRegistrationId(registrationId);
		if (!registration) {
			throw new Error(`Unknown client registration '${registrationId}'`);
		}
		return registration;
	}

	/**
	 * Expand the placeholders of a registration's redirect URI
	 *
	 * `{baseUrl}` and `{baseRedirectUrl}` leave out the scheme's default port;
	 * `{serverPort}` is always the actual port. Unknown placeholders are kept.
	 */
	expandRedirectUri(registration: ClientRegistration, context: RedirectUriContext): string {
		if (!registration.redirectUri) {
			throw new Error(`Client registration '${registration.registrationId}' has no redirect URI`);
		}

		const contextPath = context.contextPath ?? '';
		const port = DEFAULT_PORTS[context.scheme] === context.serverPort ? '' : `:${context.serverPort}`;
		const baseUrl = `${context.scheme}://${context.serverName}${port}${contextPath}`;

		const variables: Record<string, string> = {
			scheme: context.scheme,
			serverName: context.serverName,
			serverPort: String(context.serverPort),
			contextPath,
			baseUrl,
			baseRedirectUrl: baseUrl,
			registrationId: registration.registrationId,
		};

		return registration.redirectUri.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
			Object.hasOwn(variables, name) ? variables[name] : placeholder
		);
	}

	/**
	 * Generate authorization URL for OAuth login
	 */
	getAuthorizationUrl(registrationId: string, state: string, context: RedirectUriContext): string {
		const registration = this.getRegistration(registrationId);

		if (registration.authorizationGrantType !== 'authorization_code') {
			throw new Error(`Client registration '${registrationId}' does not use the authorization code grant`);
		}
		const authorizationUri = registration.providerDetails.authorizationUri;
		if (!authorizationUri) {
			throw new Error(`Client registration '${registrationId}' has no authorization URI`);
		}

		const params = new URLSearchParams({
			client_id: registration.clientId,
			redirect_uri: this.expandRedirectUri(registration, context),
			response_type: 'code',
			scope: [...registration.scope].join(' '),
			state: state,
		});

		return `${authorizationUri}?${params}`;
	}

	private getSigningKeySource(jwkSetUri: string): SigningKeySource {
		let source = this.signingKeySources.get(jwkSetUri);
		if (!source) {
			source = this.signingKeys(jwkSetUri);
			this.signingKeySources.set(jwkSetUri, source);
			this.logger?.info?.(`JWKS client initialized for ${jwkSetUri}`);
		}
		return source;
	}

	/**
	 * Verify ID token with signature verification using the registration's JWK set
	 *
	 * A registration without a JWK set URI cannot have its ID tokens verified,
	 * so they are rejected.
	 */
	async verifyIdToken(registrationId: string, idToken: string): Promise<JwtPayload> {
		const registration = this.getRegistration(registrationId);
		const jwkSetUri = registration.providerDetails.jwkSetUri;
		if (!jwkSetUri) {
			throw new Error(`Client registration '${registrationId}' has no JWK set URI to verify ID tokens with`);
		}

		const decoded = jwt.decode(idToken, { complete: true });
		if (!decoded || typeof decoded.payload === 'string') {
			throw new Error('Invalid ID token format');
		}

		try {
			const kid = decoded.header.kid;
			if (!kid) {
				throw new Error('ID token missing key ID (kid) in header');
			}

			const key = await this.getSigningKeySource(jwkSetUri).getSigningKey(kid);
			const verified = jwt.verify(idToken, key.getPublicKey(), {
				algorithms: ['RS256', 'RS384', 'RS512', 'ES256', 'ES384', 'ES512'],
				audience: registration.clientId,
				clockTolerance: 60, // Allow 60 seconds clock skew
			});
			if (typeof verified === 'string') {
				throw new Error('ID token payload is not a JSON object');
			}

			this.logger?.debug?.('ID token signature verified successfully');
			return verified;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger?.error?.('ID token signature verification failed:', message);
			throw new Error(`ID token verification failed: ${message}`);
		}
	}
}
