/**
 * Okta Client Template
 *
 * Endpoints depend on the Okta org (e.g. 'dev-12345.okta.com'), so the
 * authorization, token, user-info and JWK set URIs must be configured
 * on the registration itself.
 */

import type { ClientTemplate } from '../../types.ts';
import { DEFAULT_REDIRECT_URI } from './defaults.ts';

export const OktaTemplate: ClientTemplate = {
	clientAuthenticationMethod: 'basic',
	authorizationGrantType: 'authorization_code',
	redirectUri: DEFAULT_REDIRECT_URI,
	scope: ['openid', 'profile', 'email', 'address', 'phone'],
	clientName: 'Okta',
	clientAlias: 'okta',
};
