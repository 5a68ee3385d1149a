/**
 * GitHub Client Template
 *
 * Note: GitHub uses OAuth 2.0, not OIDC, so no ID tokens or JWK set
 */

import type { ClientTemplate } from '../../types.ts';

export const GitHubTemplate: ClientTemplate = {
	clientAuthenticationMethod: 'basic',
	authorizationGrantType: 'authorization_code',
	redirectUri: '{baseRedirectUrl}/oauth2/authorize/code/{registrationId}',
	scope: ['user'],
	authorizationUri: 'https://github.com/login/oauth/authorize',
	tokenUri: 'https://github.com/login/oauth/access_token',
	userInfoUri: 'https://api.github.com/user',
	clientName: 'GitHub',
	clientAlias: 'github',
};
