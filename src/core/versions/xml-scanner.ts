// Offset-preserving XML scanner for build descriptors
// PURITY: CORE
// INVARIANT: Comments, CDATA, processing instructions and DOCTYPE never yield values
// INVARIANT: Every reported span satisfies text.slice(start, end) === value
// COMPLEXITY: O(n) where n = |text|

/**
 * Text content of an element that has no child elements.
 *
 * @property path Element names from the document root to this element
 * @property start Offset of the first non-whitespace character of the content
 */
export interface XmlTextNode {
	readonly path: readonly string[];
	readonly value: string;
	readonly start: number;
	readonly end: number;
}

/**
 * One attribute value (without its quotes).
 */
export interface XmlAttribute {
	readonly path: readonly string[];
	readonly name: string;
	readonly value: string;
	readonly start: number;
	readonly end: number;
}

export interface XmlScan {
	readonly texts: readonly XmlTextNode[];
	readonly attributes: readonly XmlAttribute[];
}

interface OpenElement {
	readonly name: string;
	readonly contentStart: number;
	hasChildren: boolean;
	hasMarkup: boolean;
}

const NAME_CHAR = /[\w:.-]/u;
const SPACE = /\s/u;

function skipTo(text: string, from: number, terminator: string): number {
	const index = text.indexOf(terminator, from);
	return index < 0 ? text.length : index + terminator.length;
}

function readName(text: string, from: number): { name: string; next: number } {
	let next = from;
	while (next < text.length && NAME_CHAR.test(text.charAt(next))) next += 1;
	return { name: text.slice(from, next), next };
}

function skipSpace(text: string, from: number): number {
	let next = from;
	while (next < text.length && SPACE.test(text.charAt(next))) next += 1;
	return next;
}

/**
 * Reads attributes up to the end of a start tag.
 *
 * @returns Offset just past `>` and whether the tag was self-closing
 */
function readAttributes(
	text: string,
	from: number,
	path: readonly string[],
	into: XmlAttribute[],
): { next: number; selfClosing: boolean } {
	let cursor = from;
	while (cursor < text.length) {
		cursor = skipSpace(text, cursor);
		const ch = text.charAt(cursor);
		if (ch === ">") return { next: cursor + 1, selfClosing: false };
		if (ch === "/" && text.charAt(cursor + 1) === ">") {
			return { next: cursor + 2, selfClosing: true };
		}
		const { name, next } = readName(text, cursor);
		if (name.length === 0) {
			cursor += 1;
			continue;
		}
		cursor = skipSpace(text, next);
		if (text.charAt(cursor) !== "=") continue;
		cursor = skipSpace(text, cursor + 1);
		const quote = text.charAt(cursor);
		if (quote !== '"' && quote !== "'") continue;
		const valueStart = cursor + 1;
		const valueEnd = text.indexOf(quote, valueStart);
		const end = valueEnd < 0 ? text.length : valueEnd;
		into.push({
			path,
			name,
			value: text.slice(valueStart, end),
			start: valueStart,
			end,
		});
		cursor = end + 1;
	}
	return { next: text.length, selfClosing: false };
}

function closeElement(
	text: string,
	element: OpenElement,
	closeStart: number,
	path: readonly string[],
	into: XmlTextNode[],
): void {
	if (element.hasChildren || element.hasMarkup) return;
	const raw = text.slice(element.contentStart, closeStart);
	const value = raw.trim();
	if (value.length === 0) return;
	const start = element.contentStart + raw.indexOf(value);
	into.push({ path, value, start, end: start + value.length });
}

/**
 * Scans a document into leaf text nodes and attributes with their offsets.
 *
 * Not a validating parser: it tolerates unbalanced markup and only reports
 * what it can locate exactly.
 *
 * @pure true
 *
 * @example
 * ```ts
 * scanXml("<project><version>1.0</version></project>").texts;
 * // => [{ path: ["project", "version"], value: "1.0", start: 18, end: 21 }]
 * ```
 */
export function scanXml(text: string): XmlScan {
	const texts: XmlTextNode[] = [];
	const attributes: XmlAttribute[] = [];
	const stack: OpenElement[] = [];
	const names = (): string[] => stack.map((open) => open.name);
	const markParentMarkup = (): void => {
		const top = stack[stack.length - 1];
		if (top !== undefined) top.hasMarkup = true;
	};

	let cursor = 0;
	while (cursor < text.length) {
		const lt = text.indexOf("<", cursor);
		if (lt < 0) break;
		if (text.startsWith("<!--", lt)) {
			markParentMarkup();
			cursor = skipTo(text, lt + 4, "-->");
		} else if (text.startsWith("<![CDATA[", lt)) {
			markParentMarkup();
			cursor = skipTo(text, lt + 9, "]]>");
		} else if (text.startsWith("<?", lt)) {
			cursor = skipTo(text, lt + 2, "?>");
		} else if (text.startsWith("<!", lt)) {
			cursor = skipTo(text, lt + 2, ">");
		} else if (text.startsWith("</", lt)) {
			const { name } = readName(text, lt + 2);
			const openIndex = stack.map((open) => open.name).lastIndexOf(name);
			if (openIndex >= 0) {
				const path = names().slice(0, openIndex + 1);
				const element = stack[openIndex];
				if (element !== undefined) closeElement(text, element, lt, path, texts);
				stack.length = openIndex;
			}
			cursor = skipTo(text, lt + 2, ">");
		} else {
			const { name, next } = readName(text, lt + 1);
			if (name.length === 0) {
				cursor = lt + 1;
				continue;
			}
			const parent = stack[stack.length - 1];
			if (parent !== undefined) parent.hasChildren = true;
			const path = [...names(), name];
			const tag = readAttributes(text, next, path, attributes);
			if (!tag.selfClosing) {
				stack.push({
					name,
					contentStart: tag.next,
					hasChildren: false,
					hasMarkup: false,
				});
			}
			cursor = tag.next;
		}
	}
	return { texts, attributes };
}

/**
 * 1-based line number of an offset.
 *
 * @pure true
 */
export function lineAt(text: string, offset: number): number {
	let line = 1;
	for (let i = 0; i < offset && i < text.length; i += 1) {
		if (text.charCodeAt(i) === 10) line += 1;
	}
	return line;
}
