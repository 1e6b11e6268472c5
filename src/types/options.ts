import type { Equality } from './lattice.js';
import type { RangeLookup } from './license.js';
import type { LicenseRegistry } from '../license/registry.js';

export type EmptyRangeMode = 'bottom' | 'error';

export type WarningHandler = (message: string) => void;

export interface EvaluationOptions<T> {
    /** Term equality; defaults to `===`. */
    equals?: Equality<T>;
    /** Distinct variable count above which a cost warning is logged. */
    warnThreshold?: number;
    onWarning?: WarningHandler;
}

export interface ParseOptions {
    registry?: LicenseRegistry;
}

export interface TranslateOptions {
    registry?: LicenseRegistry;
    /** Overrides the registry's range table. */
    ranges?: RangeLookup;
    emptyRange?: EmptyRangeMode;
    onWarning?: WarningHandler;
}

export interface SatisfiesOptions extends TranslateOptions {
    warnThreshold?: number;
}

export const DEFAULTS = {
    variableWarningThreshold: 16,
    emptyRange: 'bottom',
} as const satisfies { variableWarningThreshold: number; emptyRange: EmptyRangeMode };
