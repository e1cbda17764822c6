export type BrowserEventCategory =
    | 'click'
    | 'keyboard'
    | 'navigation'
    | 'console'
    | 'error'
    | 'network-error'
    | 'lifecycle';

export const BROWSER_EVENT_CATEGORIES: readonly BrowserEventCategory[] = [
    'click',
    'keyboard',
    'navigation',
    'console',
    'error',
    'network-error',
    'lifecycle',
];

export interface BrowserEvent {
    timestamp: Date;
    category: BrowserEventCategory;
    payload: Record<string, unknown>;
}

export type BrowserSessionStatus =
    | 'unstarted'
    | 'loading'
    | 'ready'
    | 'closed'
    | 'failed';

export type ProbeKind = 'test' | 'popup' | 'click' | 'keyboard' | 'navigate';

export const PROBE_KINDS: readonly ProbeKind[] = [
    'test',
    'popup',
    'click',
    'keyboard',
    'navigate',
];

export type CategoryCounts = Record<BrowserEventCategory, number>;

export interface LogAnalysis {
    counts: CategoryCounts;
    summary: string;
    recommendations: string[];
}

export interface BrowserSessionInfo {
    id: string;
    status: BrowserSessionStatus;
    extensionRuntimeId?: string;
    eventCount: number;
    failure?: string;
}
