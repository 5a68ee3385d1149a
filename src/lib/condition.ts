/**
 * OAuth2 Clients Configured Condition
 *
 * Decides whether client registration support activates, from raw
 * configuration only. Templates never supply a client id, so checking the
 * raw entries gives the same answer as a full resolution.
 */

import { bindClientRegistrations, CLIENT_REGISTRATIONS_PROPERTY_PREFIX } from './config.ts';
import type { PropertySource } from './config.ts';
import type { RawClientRegistrations } from '../types.ts';

const CONDITION_NAME = 'OAuth2 Clients Configured Condition';

export interface ConditionOutcome {
	match: boolean;
	/** Report line, e.g. for startup logs */
	message: string;
	/** Registration ids with a client id, in configuration order */
	registrationIds: string[];
}

/**
 * Registration ids whose raw entry has a non-empty client id
 */
export function getConfiguredRegistrationIds(registrations: RawClientRegistrations): string[] {
	return Object.entries(registrations)
		.filter(([, registration]) => !!registration.clientId)
		.map(([registrationId]) => registrationId);
}

export function hasConfiguredClients(registrations: RawClientRegistrations): boolean {
	return getConfiguredRegistrationIds(registrations).length > 0;
}

/**
 * Evaluate the condition against a property source
 */
export function clientsConfigured(
	source: PropertySource,
	prefix: string = CLIENT_REGISTRATIONS_PROPERTY_PREFIX
): ConditionOutcome {
	const registrationIds = getConfiguredRegistrationIds(bindClientRegistrations(source, prefix));

	if (registrationIds.length > 0) {
		return {
			match: true,
			message: `${CONDITION_NAME} found OAuth2 Client(s) -> ${registrationIds.join(', ')}`,
			registrationIds,
		};
	}
	return {
		match: false,
		message: `${CONDITION_NAME} did not find OAuth2 Client(s)`,
		registrationIds,
	};
}
