import { XMLParser, XMLValidator } from "fast-xml-parser";

import { DecodeError } from "../errors";
import { FeedMap, FeedNode, isFeedMap, isFeedSeq } from "./nodes";

// Constants
// ===========================================================================

const ATTR_PREFIX = "@_";
const TEXT_KEY = "#text";

// Types
// ===========================================================================

export interface DecodeOptions {
    /**
     * Elements directly under the root that always decode as sequences, even
     * when the document has only one of them.
     */
    forceArray?: readonly string[];
}

export interface FeedDecoder {
    decode(text: string, options?: DecodeOptions): FeedMap;
}

// Functions
// ===========================================================================

function isPlainObject(x: unknown): x is Record<string, unknown> {
    return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * Collapses the parser's output for one element:
 *
 * -   text only → the text;
 * -   attributes and child elements share one map, attributes first, so an
 *     attribute and children of the same name end up in one sequence;
 * -   text beside attributes or children goes under `content`.
 *
 * Names are collected in a `Map` and copied out as own properties, so
 * `__proto__`, `constructor` and the like are ordinary fields.
 */
function normalize(raw: unknown): FeedNode {
    if (Array.isArray(raw)) {
        return raw.map(normalize);
    }
    if (!isPlainObject(raw)) {
        return raw === undefined || raw === null ? "" : String(raw);
    }

    const fields = new Map<string, FeedNode>();
    const children: Array<[string, FeedNode]> = [];
    let text: undefined | string;

    for (const [key, value] of Object.entries(raw)) {
        if (key.startsWith(ATTR_PREFIX)) {
            fields.set(key.slice(ATTR_PREFIX.length), String(value));
        } else if (key === TEXT_KEY) {
            text = String(value);
        } else {
            children.push([key, normalize(value)]);
        }
    }

    if (fields.size === 0 && children.length === 0) {
        return text ?? "";
    }

    if (text !== undefined) {
        fields.set("content", text);
    }
    for (const [name, child] of children) {
        const existing = fields.get(name);
        if (existing === undefined) {
            fields.set(name, child);
        } else {
            fields.set(name, [
                ...(isFeedSeq(existing) ? existing : [existing]),
                ...(isFeedSeq(child) ? child : [child]),
            ]);
        }
    }
    return Object.fromEntries(fields);
}

// Class Definition
// ===========================================================================

/**
 * Decodes feed XML into {@link FeedMap}s. The root element is dropped: its
 * attributes and children are the top level of the result.
 */
export default class XmlFeedDecoder implements FeedDecoder {
    private readonly _parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: ATTR_PREFIX,
        textNodeName: TEXT_KEY,
        parseTagValue: false,
        parseAttributeValue: false,
        ignoreDeclaration: true,
        ignorePiTags: true,
        trimValues: true,
    });

    decode(text: string, options: DecodeOptions = {}): FeedMap {
        if (text.trim() === "") {
            throw new DecodeError("Empty document");
        }
        const validation = XMLValidator.validate(text);
        if (validation !== true) {
            const { msg, line } = validation.err;
            throw new DecodeError(`Malformed XML at line ${line}: ${msg}`);
        }

        const parsed: unknown = this._parser.parse(text);
        const roots = isPlainObject(parsed) ? Object.entries(parsed) : [];
        if (roots.length !== 1) {
            throw new DecodeError(
                `Expected exactly one root element, found ${roots.length}`
            );
        }

        const root = normalize(roots[0][1]);
        let doc: Record<string, FeedNode>;
        if (typeof root === "string") {
            doc = { content: root };
        } else if (isFeedMap(root)) {
            doc = { ...root };
        } else {
            throw new DecodeError("Root element decoded to a sequence");
        }

        for (const name of options.forceArray ?? []) {
            const node = doc[name];
            if (node !== undefined && !isFeedSeq(node)) {
                doc[name] = [node];
            }
        }

        return doc;
    }
}
