import {
    BrowserEvent,
    BrowserEventCategory,
    CategoryCounts,
} from '../../types/browser';

/** Append-only, ordered capture of runtime events for one browser session. */
export class BrowserEventLog {
    private readonly events: BrowserEvent[] = [];

    constructor(private readonly now: () => Date = () => new Date()) { }

    get size(): number {
        return this.events.length;
    }

    append(category: BrowserEventCategory, payload: Record<string, unknown>): BrowserEvent {
        const event: BrowserEvent = { timestamp: this.now(), category, payload: { ...payload } };
        this.events.push(event);
        return event;
    }

    entries(): BrowserEvent[] {
        return this.events.map((event) => ({ ...event, payload: { ...event.payload } }));
    }

    since(index: number): BrowserEvent[] {
        return this.entries().slice(index);
    }

    counts(): CategoryCounts {
        return countByCategory(this.events);
    }
}

export function emptyCounts(): CategoryCounts {
    return {
        click: 0,
        keyboard: 0,
        navigation: 0,
        console: 0,
        error: 0,
        'network-error': 0,
        lifecycle: 0,
    };
}

export function countByCategory(events: readonly BrowserEvent[]): CategoryCounts {
    const counts = emptyCounts();
    for (const event of events) {
        counts[event.category] += 1;
    }
    return counts;
}
