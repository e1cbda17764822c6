import {
    BROWSER_EVENT_CATEGORIES,
    BrowserEvent,
    LogAnalysis,
} from '../../types/browser';
import { countByCategory } from './BrowserEventLog';

export const HIGH_CLICK_THRESHOLD = 10;

export function isConsoleError(event: BrowserEvent): boolean {
    return event.category === 'console' && event.payload.level === 'error';
}

export function isExtensionFailure(event: BrowserEvent): boolean {
    return event.category === 'lifecycle' && event.payload.level === 'error';
}

/** Per-category counts, a one-line summary and rule-based recommendations. */
export function analyzeLog(events: readonly BrowserEvent[]): LogAnalysis {
    const counts = countByCategory(events);

    const javascriptErrors =
        counts.error + events.filter((event) => isConsoleError(event)).length;
    const extensionFailures = events.filter((event) => isExtensionFailure(event)).length;

    let summary: string;
    if (events.length === 0) {
        summary = 'No browser events were recorded.';
    } else {
        const breakdown = BROWSER_EVENT_CATEGORIES.filter((category) => counts[category] > 0)
            .map((category) => `${category}: ${counts[category]}`)
            .join(', ');
        summary =
            `Logged ${events.length} event${events.length === 1 ? '' : 's'} ` +
            `with ${javascriptErrors} JavaScript error${javascriptErrors === 1 ? '' : 's'}. ` +
            `Event breakdown: ${breakdown}.`;
    }

    const recommendations: string[] = [];
    if (javascriptErrors > 0) {
        recommendations.push(`Found ${javascriptErrors} JavaScript errors that may need fixing`);
    }
    if (counts['network-error'] > 0) {
        recommendations.push(
            `Found ${counts['network-error']} network errors that may indicate connectivity issues`,
        );
    }
    if (extensionFailures > 0) {
        recommendations.push(
            `Found ${extensionFailures} extension-specific errors that may need code review`,
        );
    }
    if (counts.click > HIGH_CLICK_THRESHOLD) {
        recommendations.push('High number of clicks detected - consider optimizing user interface');
    }

    return { counts, summary, recommendations };
}

/** Error lines worth quoting to the generator, newest last. */
export function errorExcerpts(events: readonly BrowserEvent[], limit = 5): string[] {
    return events
        .filter(
            (event) =>
                event.category === 'error' ||
                event.category === 'network-error' ||
                isConsoleError(event) ||
                isExtensionFailure(event),
        )
        .map((event) => {
            const message = event.payload.message ?? event.payload.text ?? event.payload.url;
            return `${event.category}: ${typeof message === 'string' ? message : JSON.stringify(event.payload)}`;
        })
        .slice(-limit);
}
