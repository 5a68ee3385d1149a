/**
 * OAuth2 Client Configuration
 *
 * Property source and binding utilities for client registrations
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import type { RawClientRegistration, RawClientRegistrations } from '../types.ts';

/**
 * Where client registrations live in the configuration
 *
 * @example
 * ```yaml
 * oauth2:
 *   client:
 *     registrations:
 *       google:
 *         client-id: ${GOOGLE_CLIENT_ID}
 *         client-secret: ${GOOGLE_CLIENT_SECRET}
 * ```
 */
export const CLIENT_REGISTRATIONS_PROPERTY_PREFIX = 'oauth2.client.registrations';

/**
 * Expand environment variable in a string value
 *
 * If the value is a string in the format `${VAR_NAME}`, it will be replaced
 * with the value of the environment variable. Non-string values are returned unchanged.
 *
 * @example
 * expandEnvVar('${MY_VAR}') // Returns process.env.MY_VAR or '${MY_VAR}' if undefined
 * expandEnvVar('literal')   // Returns 'literal'
 * expandEnvVar(123)         // Returns 123
 */
export function expandEnvVar(value: unknown): unknown {
	if (typeof value === 'string' && value.startsWith('${') && value.endsWith('}')) {
		const envVar = value.slice(2, -1);
		const envValue = process.env[envVar];
		// Only use env value if it exists (even if empty string)
		return envValue !== undefined ? envValue : value;
	}
	return value;
}

const propertyMapSchema = z.record(z.string(), z.unknown());

type PropertyMap = z.infer<typeof propertyMapSchema>;

function isPropertyMap(value: unknown): value is PropertyMap {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Property maps have no prototype: every key, `constructor` and `__proto__`
 * included, is an own data property
 */
function createPropertyMap(): PropertyMap {
	return Object.create(null);
}

function getOwn(map: PropertyMap, key: string): unknown {
	return Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * Validate a map and copy its entries into a property map
 *
 * The copy is taken from the input, since zod's record output leaves out
 * `__proto__` keys.
 */
function toPropertyMap(value: unknown): PropertyMap {
	const parsed = propertyMapSchema.safeParse(value);
	if (!parsed.success) {
		throw parsed.error;
	}

	const map = createPropertyMap();
	for (const [key, entry] of Object.entries(isPropertyMap(value) ? value : parsed.data)) {
		map[key] = entry;
	}
	return map;
}

/**
 * Property Source
 *
 * Nested configuration tree (as parsed from YAML) with dotted-path access.
 * Keys keep their case.
 */
export class PropertySource {
	private readonly properties: PropertyMap;

	constructor(properties: PropertyMap = createPropertyMap()) {
		this.properties = properties;
	}

	/**
	 * Build a source from flat dotted keys
	 *
	 * @example
	 * PropertySource.fromFlat({ 'oauth2.client.registrations.google.client-id': 'abc' });
	 */
	static fromFlat(flat: Record<string, unknown>): PropertySource {
		const root = createPropertyMap();

		for (const [key, value] of Object.entries(flat)) {
			const segments = key.split('.');
			const leaf = segments.pop();
			if (!leaf) {
				throw new Error(`Invalid property name: '${key}'`);
			}

			let node = root;
			for (const segment of segments) {
				const child = getOwn(node, segment);
				if (child === undefined) {
					const created = createPropertyMap();
					node[segment] = created;
					node = created;
				} else if (isPropertyMap(child)) {
					node = child;
				} else {
					throw new Error(`Property '${key}' conflicts with a value at '${segment}'`);
				}
			}

			if (isPropertyMap(getOwn(node, leaf))) {
				throw new Error(`Property '${key}' conflicts with nested properties`);
			}
			node[leaf] = value;
		}

		return new PropertySource(root);
	}

	/**
	 * Get the value at a dotted path, or undefined when any segment is missing
	 */
	get(path: string): unknown {
		let value: unknown = this.properties;
		for (const segment of path.split('.')) {
			if (!isPropertyMap(value)) return undefined;
			value = getOwn(value, segment);
		}
		return value;
	}

	/**
	 * Bind the map below a prefix: key (next path segment) -> nested value
	 *
	 * Returns an empty map when nothing is configured under the prefix.
	 * Throws if the prefix holds something other than a map.
	 */
	bindMap(prefix: string): PropertyMap {
		const value = this.get(prefix);
		if (value === undefined || value === null) {
			return createPropertyMap();
		}
		return toPropertyMap(value);
	}
}

/**
 * Load a property source from a YAML (or JSON) file
 */
export async function loadPropertySource(path: string | URL): Promise<PropertySource> {
	const content = await readFile(path, 'utf8');
	const parsed: unknown = YAML.parse(content);

	// An empty file has no properties
	if (parsed === null || parsed === undefined) {
		return new PropertySource();
	}
	return new PropertySource(toPropertyMap(parsed));
}

// ============================================================================
// Client registration binding
// ============================================================================

/**
 * Convert kebab-case property names to camelCase (client-id -> clientId)
 */
function toCamelCase(name: string): string {
	return name.replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function expandValue(value: unknown): unknown {
	return Array.isArray(value) ? value.map(expandEnvVar) : expandEnvVar(value);
}

/**
 * Normalize a registration's property names and expand environment variables
 */
function normalizeRegistration(input: unknown): unknown {
	if (!isPropertyMap(input)) return input;

	const normalized = createPropertyMap();
	for (const [key, value] of Object.entries(input)) {
		// `client-id:` with no value in YAML is absent, not empty
		if (value === null) continue;
		normalized[toCamelCase(key)] = expandValue(value);
	}
	return normalized;
}

/** Scalar text; YAML turns numeric-looking client ids into numbers */
const text = z.union([z.string(), z.number()]).transform(String).optional();

/** Enum values bind relaxed: 'Authorization-Code' -> 'authorization_code' */
const enumValue = z
	.string()
	.transform((value) => value.trim().toLowerCase().replace(/-/g, '_'))
	.optional();

/** A comma separated string or a list; list items may be numbers in YAML */
const scope = z
	.union([
		z.string().transform((value) => value.split(',')),
		z.array(z.union([z.string(), z.number()]).transform(String)),
	])
	.transform((values) => values.map((value) => value.trim()).filter((value) => value.length > 0))
	.optional();

export const RawClientRegistrationSchema = z.preprocess(
	normalizeRegistration,
	z.object({
		clientId: text,
		clientSecret: text,
		templateId: text,
		clientAuthenticationMethod: enumValue,
		authorizationGrantType: enumValue,
		redirectUri: text,
		scope,
		authorizationUri: text,
		tokenUri: text,
		userInfoUri: text,
		jwkSetUri: text,
		clientName: text,
		clientAlias: text,
	})
);

/**
 * Bind raw client registrations (registration id -> registration) below a prefix
 *
 * Property names may be kebab-case (`client-id`) or camelCase (`clientId`).
 * Registration ids are kept as configured. A shape that cannot be bound
 * throws the underlying `ZodError`.
 */
export function bindClientRegistrations(
	source: PropertySource,
	prefix: string = CLIENT_REGISTRATIONS_PROPERTY_PREFIX
): RawClientRegistrations {
	const registrations: Record<string, RawClientRegistration> = Object.create(null);

	for (const [registrationId, properties] of Object.entries(source.bindMap(prefix))) {
		registrations[registrationId] = RawClientRegistrationSchema.parse(properties);
	}

	return registrations;
}
