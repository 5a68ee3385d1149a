/**
 * Google Client Template
 *
 * Supports OpenID Connect (OIDC) with ID tokens
 */

import type { ClientTemplate } from '../../types.ts';
import { DEFAULT_REDIRECT_URI } from './defaults.ts';

export const GoogleTemplate: ClientTemplate = {
	clientAuthenticationMethod: 'basic',
	authorizationGrantType: 'authorization_code',
	redirectUri: DEFAULT_REDIRECT_URI,
	scope: ['openid', 'profile', 'email', 'address', 'phone'],
	authorizationUri: 'https://accounts.google.com/o/oauth2/v2/auth',
	tokenUri: 'https://www.googleapis.com/oauth2/v4/token',
	userInfoUri: 'https://www.googleapis.com/oauth2/v3/userinfo',
	jwkSetUri: 'https://www.googleapis.com/oauth2/v3/certs',
	clientName: 'Google',
	clientAlias: 'google',
};
