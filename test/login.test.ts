import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { OAuth2Login } from '../src/lib/login.ts';
import type { RedirectUriContext, SigningKeySource, SigningKeySourceFactory } from '../src/lib/login.ts';
import { resolveClientRegistrations } from '../src/lib/registrations.ts';
import { templates } from '../src/lib/templates/index.ts';
import type { ClientRegistration } from '../src/types.ts';

const { publicKey, privateKey } = generateKeyPairSync('rsa', {
	modulusLength: 2048,
	publicKeyEncoding: { type: 'spki', format: 'pem' },
	privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

const repository = resolveClientRegistrations(templates, {
	google: { clientId: 'google-client-id', clientSecret: 'google-client-secret' },
	github: { clientId: 'github-client-id', clientSecret: 'github-client-secret' },
	custom: { clientId: 'custom-client-id', authorizationGrantType: 'client_credentials' },
	tenant: { clientId: 'tenant-client-id', redirectUri: '{baseUrl}/callback/{tenant}' },
	builtins: { clientId: 'builtins-client-id', redirectUri: '{baseUrl}/{constructor}/{toString}/{registrationId}' },
});

function getRegistration(registrationId: string): ClientRegistration {
	const registration = repository.findByRegistrationId(registrationId);
	if (!registration) throw new Error(`missing test registration ${registrationId}`);
	return registration;
}

const context: RedirectUriContext = {
	scheme: 'https',
	serverName: 'app.example.com',
	serverPort: 8443,
	contextPath: '/app',
};

describe('OAuth2Login', () => {
	let getSigningKey: Mock<SigningKeySource['getSigningKey']>;
	let signingKeys: Mock<SigningKeySourceFactory>;
	let login: OAuth2Login;

	beforeEach(() => {
		getSigningKey = vi.fn<SigningKeySource['getSigningKey']>(async () => ({ getPublicKey: () => publicKey }));
		signingKeys = vi.fn<SigningKeySourceFactory>(() => ({ getSigningKey }));
		login = new OAuth2Login(repository, { signingKeys });
	});

	describe('expandRedirectUri', () => {
		it('expands the default redirect URI', () => {
			expect(login.expandRedirectUri(getRegistration('google'), context)).toBe(
				'https://app.example.com:8443/app/oauth2/authorize/code/google'
			);
		});

		it('always includes the port for {serverPort}', () => {
			const redirectUri = login.expandRedirectUri(getRegistration('google'), {
				scheme: 'https',
				serverName: 'app.example.com',
				serverPort: 443,
			});

			expect(redirectUri).toBe('https://app.example.com:443/oauth2/authorize/code/google');
		});

		it('leaves the default port out of {baseRedirectUrl}', () => {
			const redirectUri = login.expandRedirectUri(getRegistration('github'), {
				scheme: 'https',
				serverName: 'app.example.com',
				serverPort: 443,
			});

			expect(redirectUri).toBe('https://app.example.com/oauth2/authorize/code/github');
		});

		it('keeps unknown placeholders', () => {
			const redirectUri = login.expandRedirectUri(getRegistration('tenant'), {
				scheme: 'http',
				serverName: 'localhost',
				serverPort: 8080,
			});

			expect(redirectUri).toBe('http://localhost:8080/callback/{tenant}');
		});

		it('keeps placeholders named like object properties', () => {
			const redirectUri = login.expandRedirectUri(getRegistration('builtins'), {
				scheme: 'http',
				serverName: 'localhost',
				serverPort: 8080,
			});

			expect(redirectUri).toBe('http://localhost:8080/{constructor}/{toString}/builtins');
		});

		it('fails without a redirect URI', () => {
			expect(() => login.expandRedirectUri(getRegistration('custom'), context)).toThrow(
				"Client registration 'custom' has no redirect URI"
			);
		});
	});

	describe('getAuthorizationUrl', () => {
		it('builds an authorization code request', () => {
			const url = new URL(login.getAuthorizationUrl('google', 'state-123', context));

			expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/v2/auth');
			expect(url.searchParams.get('client_id')).toBe('google-client-id');
			expect(url.searchParams.get('redirect_uri')).toBe(
				'https://app.example.com:8443/app/oauth2/authorize/code/google'
			);
			expect(url.searchParams.get('response_type')).toBe('code');
			expect(url.searchParams.get('scope')).toBe('openid profile email address phone');
			expect(url.searchParams.get('state')).toBe('state-123');
		});

		it('fails for an unknown registration', () => {
			expect(() => login.getAuthorizationUrl('unknown', 'state-123', context)).toThrow(
				"Unknown client registration 'unknown'"
			);
		});

		it('fails for a registration without the authorization code grant', () => {
			expect(() => login.getAuthorizationUrl('custom', 'state-123', context)).toThrow(
				"Client registration 'custom' does not use the authorization code grant"
			);
		});
	});

	describe('verifyIdToken', () => {
		it('verifies the signature against the JWK set', async () => {
			const idToken = jwt.sign({ sub: 'user-1' }, privateKey, {
				algorithm: 'RS256',
				keyid: 'key-1',
				audience: 'google-client-id',
				expiresIn: '5m',
			});

			const claims = await login.verifyIdToken('google', idToken);

			expect(claims.sub).toBe('user-1');
			expect(signingKeys).toHaveBeenCalledWith('https://www.googleapis.com/oauth2/v3/certs');
			expect(getSigningKey).toHaveBeenCalledWith('key-1');
		});

		it('reuses the key source of a JWK set', async () => {
			const idToken = jwt.sign({ sub: 'user-1' }, privateKey, {
				algorithm: 'RS256',
				keyid: 'key-1',
				audience: 'google-client-id',
				expiresIn: '5m',
			});

			await login.verifyIdToken('google', idToken);
			await login.verifyIdToken('google', idToken);

			expect(signingKeys).toHaveBeenCalledTimes(1);
			expect(getSigningKey).toHaveBeenCalledTimes(2);
		});

		it('rejects a token for another client', async () => {
			const idToken = jwt.sign({ sub: 'user-1' }, privateKey, {
				algorithm: 'RS256',
				keyid: 'key-1',
				audience: 'other-client-id',
				expiresIn: '5m',
			});

			await expect(login.verifyIdToken('google', idToken)).rejects.toThrow(
				'ID token verification failed: jwt audience invalid'
			);
		});

		it('rejects a token without a key id', async () => {
			const idToken = jwt.sign({ sub: 'user-1' }, privateKey, {
				algorithm: 'RS256',
				audience: 'google-client-id',
				expiresIn: '5m',
			});

			await expect(login.verifyIdToken('google', idToken)).rejects.toThrow(
				'ID token verification failed: ID token missing key ID (kid) in header'
			);
			expect(getSigningKey).not.toHaveBeenCalled();
		});

		it('rejects a malformed token', async () => {
			await expect(login.verifyIdToken('google', 'not-a-token')).rejects.toThrow('Invalid ID token format');
		});

		it('rejects any token for a registration without a JWK set', async () => {
			const idToken = jwt.sign({ sub: 'admin' }, 'test-secret', {
				audience: 'github-client-id',
				expiresIn: '5m',
			});

			await expect(login.verifyIdToken('github', idToken)).rejects.toThrow(
				"Client registration 'github' has no JWK set URI to verify ID tokens with"
			);
			expect(signingKeys).not.toHaveBeenCalled();
		});

		it('fails for an unknown registration', async () => {
			await expect(login.verifyIdToken('unknown', 'not-a-token')).rejects.toThrow(
				"Unknown client registration 'unknown'"
			);
		});
	});
});
