import { LogAnalysis } from '../../types/browser';
import { GenerationAction } from '../../types/generation';
import { GenerationIntent } from '../intent/schema';
import { TEMPLATE_ICONS } from '../workspace/WorkspaceStore';
import { toSingleLine } from './GenerationEngine';

export interface InstructionContext {
    /** Files of the current extension; empty for build. */
    priorFileList: string[];
    /** Latest browser log analysis, quoted into fix instructions. */
    debug?: LogAnalysis;
    /** Error lines from that log, newest last. */
    errorExcerpts?: string[];
}

const ICON_NOTE =
    `Icons ${TEMPLATE_ICONS.join(', ')} already exist in the directory; reference them and do not create or modify image files.`;

/** Single-line instruction for the generation process. */
export function composeInstruction(intent: GenerationIntent, context: InstructionContext): string {
    const parts: string[] = [];

    switch (intent.kind) {
        case 'build':
            parts.push(
                'Create a complete Chrome extension (Manifest V3) in the current directory.',
                `Requirements: ${sentence(intent.requirements)}`,
            );
            if (intent.features.length) {
                parts.push(`Features: ${intent.features.join('; ')}.`);
            }
            if (intent.targetSites.length) {
                parts.push(`It should run on: ${intent.targetSites.join(', ')}.`);
            }
            parts.push(
                'Write manifest.json with name and description, and every file it references (popup, scripts, styles).',
            );
            break;
        case 'fix':
            parts.push(
                'Fix the existing Chrome extension in the current directory.',
                `Problem reported by the user: ${sentence(intent.symptom)}`,
            );
            if (intent.errorText) {
                parts.push(`Error message: ${sentence(intent.errorText)}`);
            }
            if (context.debug && context.debug.summary) {
                parts.push(`Browser log: ${sentence(context.debug.summary)}`);
                if (context.debug.recommendations.length) {
                    parts.push(`Findings: ${context.debug.recommendations.join('; ')}.`);
                }
            }
            if (context.errorExcerpts?.length) {
                parts.push(`Recent errors: ${context.errorExcerpts.join(' | ')}.`);
            }
            break;
        case 'improve':
            parts.push(
                'Improve the existing Chrome extension in the current directory.',
                `Requested change: ${sentence(intent.enhancement)}`,
            );
            break;
    }

    if (intent.kind !== 'build') {
        if (context.priorFileList.length) {
            parts.push(`Existing files: ${context.priorFileList.join(', ')}.`);
        }
        parts.push('Change only what is needed and keep every other file as it is.');
    }
    parts.push(ICON_NOTE);

    return toSingleLine(parts.join(' '));
}

export function describeAction(action: GenerationAction): string {
    switch (action) {
        case 'build':
            return 'Building';
        case 'fix':
            return 'Fixing';
        case 'improve':
            return 'Improving';
    }
}

function sentence(text: string): string {
    const trimmed = text.trim();
    return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}
