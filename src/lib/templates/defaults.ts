/**
 * Redirect URI used by templates that do not need a provider-specific one
 */
export const DEFAULT_REDIRECT_URI =
	'{scheme}://{serverName}:{serverPort}{contextPath}/oauth2/authorize/code/{registrationId}';
