/**
 * Facebook Client Template
 *
 * Facebook expects client credentials in the request body
 */

import type { ClientTemplate } from '../../types.ts';
import { DEFAULT_REDIRECT_URI } from './defaults.ts';

export const FacebookTemplate: ClientTemplate = {
	clientAuthenticationMethod: 'post',
	authorizationGrantType: 'authorization_code',
	redirectUri: DEFAULT_REDIRECT_URI,
	scope: ['public_profile', 'email'],
	authorizationUri: 'https://www.facebook.com/v2.8/dialog/oauth',
	tokenUri: 'https://graph.facebook.com/v2.8/oauth/access_token',
	userInfoUri: 'https://graph.facebook.com/me',
	clientName: 'Facebook',
	clientAlias: 'facebook',
};
