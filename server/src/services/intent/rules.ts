import { Intent } from './schema';

const SMALL_TALK =
    /^(hi|hello|hey|yo|thanks|thank you|thx|ok|okay|cool|great|nice|good (morning|afternoon|evening)|bye)\b[\s!.,:)]*$/i;

const QUESTION_START =
    /^(what|how|why|when|where|which|who|is|are|does|do|should|explain)\b/i;

const FIX_PATTERN =
    /\b(errors?|bugs?|buggy|broken|crash(es|ed|ing)?|throws?|throwing|exceptions?|fix|fails?|failing|failed|doesn'?t work|does not work|not working|stopped working|nothing happens)\b/i;

const BUILD_VERB = /\b(build|create|make|generate|develop|write|scaffold)\b/i;

const EXTENSION_NOUN = /\b(extensions?|add-?ons?|plugins?)\b/i;

const IMPROVE_PATTERN =
    /\b(add|improve|enhance|change|update|modify|extend|replace|rename|restyle|redesign|support|also|instead|make it|make the)\b/i;

// "debug it", "please debug the extension": the whole message asks for debugging.
const DEBUG_ONLY =
    /^\s*(?:please\s+)?debug(?:ging)?(?:\s+(?:it|this|that|the\s+extension|my\s+extension|the\s+popup|please))*[\s.!?]*$/i;

// "analyze the logs", "show me the analysis": a verb aimed at the captured log.
const LOG_REQUEST =
    /\b(?:analy[sz]e|check|review|inspect|show(?:\s+me)?|read|look\s+at|summari[sz]e)\s+(?:the\s+|my\s+|its\s+)?(?:browser\s+|debug\s+|console\s+|extension\s+|error\s+)?(?:logs?|analysis)\b/i;

const ERROR_TEXT_PATTERN =
    /(?:Uncaught\s+)?\b[A-Z][A-Za-z]*Error\b:?[^\n]*|"([^"]+)"|`([^`]+)`/;

const FEATURE_SPLIT = /\s*(?:,|;|\band\b)\s*/i;

const TARGET_SITE_PATTERN =
    /\b(?:on|for)\s+((?:https?:\/\/)?(?:[a-z0-9-]+\.)+[a-z]{2,}(?:\/\S*)?)/gi;

/**
 * A request to inspect the browser log rather than change the extension.
 * Build requests never qualify, whatever they say about logs.
 */
export function isDebugRequest(message: string): boolean {
    const text = message.trim();
    if (BUILD_VERB.test(text) && EXTENSION_NOUN.test(text)) {
        return false;
    }
    return DEBUG_ONLY.test(text) || LOG_REQUEST.test(text);
}

/**
 * Deterministic first pass. Returns undefined when no rule is confident and
 * the model fallback should decide.
 */
export function classifyByRules(message: string): Intent | undefined {
    const text = message.trim();
    if (!text) {
        return { kind: 'none' };
    }

    if (SMALL_TALK.test(text)) {
        return { kind: 'none' };
    }

    if (QUESTION_START.test(text) && text.endsWith('?')) {
        return { kind: 'answer', question: text };
    }

    if (FIX_PATTERN.test(text)) {
        return { kind: 'fix', symptom: text, errorText: extractErrorText(text) };
    }

    if (BUILD_VERB.test(text) && EXTENSION_NOUN.test(text)) {
        return {
            kind: 'build',
            requirements: text,
            features: extractFeatures(text),
            targetSites: extractTargetSites(text),
        };
    }

    if (IMPROVE_PATTERN.test(text)) {
        return { kind: 'improve', enhancement: text };
    }

    return undefined;
}

export function extractErrorText(text: string): string | null {
    const match = ERROR_TEXT_PATTERN.exec(text);
    if (!match) {
        return null;
    }
    const quoted = match[1] ?? match[2];
    return (quoted ?? match[0]).trim() || null;
}

function extractFeatures(text: string): string[] {
    const withClause = /\b(?:that|which|to|with)\b\s+(.+)$/i.exec(text);
    if (!withClause) {
        return [];
    }
    return withClause[1]
        .split(FEATURE_SPLIT)
        .map((part) => part.replace(/[.!]+$/, '').trim())
        .filter(Boolean);
}

function extractTargetSites(text: string): string[] {
    const sites = new Set<string>();
    for (const match of text.matchAll(TARGET_SITE_PATTERN)) {
        sites.add(match[1].replace(/[.,!?]+$/, ''));
    }
    return [...sites];
}
