/**
 * Client Template Catalog
 */

import { GitHubTemplate } from './github.ts';
import { GoogleTemplate } from './google.ts';
import { FacebookTemplate } from './facebook.ts';
import { OktaTemplate } from './okta.ts';
import type { ClientTemplate, TemplateCatalog } from '../../types.ts';

export { DEFAULT_REDIRECT_URI } from './defaults.ts';

function freezeTemplate(template: ClientTemplate): ClientTemplate {
	return Object.freeze({
		...template,
		...(template.scope && { scope: Object.freeze([...template.scope]) }),
	});
}

/**
 * Build an immutable catalog from named templates
 *
 * Later entries replace earlier ones with the same name, so custom templates
 * can be layered over the built-in ones:
 *
 * @example
 * const catalog = createTemplateCatalog(templates, { gitlab: { clientName: 'GitLab', ... } });
 */
export function createTemplateCatalog(...sources: Readonly<Record<string, ClientTemplate>>[]): TemplateCatalog {
	const catalog: Record<string, ClientTemplate> = {};
	for (const source of sources) {
		for (const [name, template] of Object.entries(source)) {
			catalog[name] = freezeTemplate(template);
		}
	}
	return Object.freeze(catalog);
}

export const templates: TemplateCatalog = createTemplateCatalog({
	google: GoogleTemplate,
	github: GitHubTemplate,
	facebook: FacebookTemplate,
	okta: OktaTemplate,
});

/**
 * Get a template by name (case-insensitive exact match)
 */
export function getTemplate(name: string, catalog: TemplateCatalog = templates): ClientTemplate | null {
	const wanted = name.toLowerCase();
	const match = Object.entries(catalog).find(([templateName]) => templateName.toLowerCase() === wanted);

	// Return null to let the registration stand on its own configuration
	return match ? match[1] : null;
}

/**
 * Get all template names in a catalog
 */
export function getTemplateNames(catalog: TemplateCatalog = templates): string[] {
	return Object.keys(catalog);
}
