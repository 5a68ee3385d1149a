import { describe, it, expect } from 'vitest';
import { createTemplateCatalog, getTemplate, getTemplateNames, templates } from '../src/lib/templates/index.ts';

describe('templates', () => {
	it('ships the built-in providers', () => {
		expect(getTemplateNames()).toEqual(['google', 'github', 'facebook', 'okta']);
	});

	it('looks templates up case-insensitively', () => {
		expect(getTemplate('GitHub')).toBe(templates.github);
		expect(getTemplate('GOOGLE')?.clientName).toBe('Google');
	});

	it('returns null for unknown templates', () => {
		expect(getTemplate('gitlab')).toBeNull();
		expect(getTemplate('')).toBeNull();
	});

	it('cannot be modified', () => {
		expect(Object.isFrozen(templates)).toBe(true);
		expect(Object.isFrozen(templates.google)).toBe(true);
		expect(Object.isFrozen(templates.google.scope)).toBe(true);
	});
});

describe('createTemplateCatalog', () => {
	it('layers custom templates over the built-in ones', () => {
		const scope = ['read_user'];
		const catalog = createTemplateCatalog(templates, {
			gitlab: { clientName: 'GitLab', scope },
			github: { clientName: 'GitHub Enterprise' },
		});
		scope.push('api');

		expect(getTemplateNames(catalog)).toEqual(['google', 'github', 'facebook', 'okta', 'gitlab']);
		expect(getTemplate('gitlab', catalog)?.scope).toEqual(['read_user']);
		expect(getTemplate('github', catalog)).toEqual({ clientName: 'GitHub Enterprise' });
		expect(templates.github.clientName).toBe('GitHub');
	});
});
