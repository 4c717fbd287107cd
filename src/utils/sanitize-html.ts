import * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { isTag, isText } from 'domhandler';
import { DEFAULT_ALLOWED_TAGS } from '../constants';

// Telegram only understands &lt; &gt; &amp; &quot; and numeric entities
const NBSP_ENTITY = /&nbsp;/g;

/**
 * Reduce an HTML fragment to the allowed tags.
 * Disallowed elements are removed together with their children, never unwrapped.
 * Comments and other non-text nodes are dropped, and only `href` on `<a>` survives.
 */
export function sanitizeHtml(html: string, allowedTags: ReadonlySet<string> = DEFAULT_ALLOWED_TAGS): string {
	if (!html) return '';

	const $ = cheerio.load(html, {}, false);
	prune($, $.root().contents().toArray(), allowedTags);

	return $.html().replace(NBSP_ENTITY, '&#160;');
}

function prune($: cheerio.CheerioAPI, nodes: AnyNode[], allowedTags: ReadonlySet<string>): void {
	for (const node of nodes) {
		if (isTag(node)) {
			if (!allowedTags.has(node.name.toLowerCase())) {
				$(node).remove();
				continue;
			}
			stripAttributes(node);
			prune($, [...node.children], allowedTags);
		} else if (!isText(node)) {
			$(node).remove();
		}
	}
}

function stripAttributes(el: Element): void {
	for (const name of Object.keys(el.attribs)) {
		if (el.name === 'a' && name === 'href') continue;
		delete el.attribs[name];
	}
}
