/**
 * License Registry
 *
 * Registered license and exception identifiers, OSI approval flags, and
 * the license-family ranges used to expand `+` (or-later) references.
 */

import { z } from 'zod';
import rawData from '../data/licenses.json';
import type { LicenseExceptionInfo, LicenseInfo } from '../types/index.js';
import { createInvalidDataError } from '../types/index.js';

const idSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9.\-]*$/, 'identifiers use letters, digits, "." and "-"');

export const licenseDataSchema = z.object({
    licenses: z.array(z.object({
        id: idSchema,
        name: z.string().min(1),
        osiApproved: z.boolean(),
        deprecated: z.boolean().optional().default(false),
    })),
    exceptions: z.array(z.object({
        id: idSchema,
        name: z.string().min(1),
    })),
    ranges: z.array(z.array(idSchema).min(1)),
});

export type LicenseDataInput = z.input<typeof licenseDataSchema>;

export interface LicenseRegistry {
    licenses(): readonly LicenseInfo[];
    licenseIdentifiers(): readonly string[];
    /** Canonical spelling of a registered identifier, matched case-insensitively. */
    mkLicenseId(text: string): string | undefined;
    isOsiApproved(id: string): boolean;
    licenseExceptions(): readonly LicenseExceptionInfo[];
    mkLicenseExceptionId(text: string): string | undefined;
    licenseRanges(): readonly (readonly string[])[];
    /**
     * The identifier and every later member of its family.
     * An identifier outside every family is its own range.
     */
    lookupLicenseRange(id: string): readonly string[];
}

/**
 * Validate raw registry data and build a lookup-backed registry
 */
export function createLicenseRegistry(data: unknown): LicenseRegistry {
    const parsed = licenseDataSchema.safeParse(data);
    if (!parsed.success) {
        throw createInvalidDataError(parsed.error.issues.map(formatIssue).join('; '), {
            issues: parsed.error.issues,
        });
    }

    const { licenses, exceptions, ranges } = parsed.data;

    const licenseIndex = indexById(licenses, 'license');
    const exceptionIndex = indexById(exceptions, 'exception');

    const rangeIndex = new Map<string, { range: readonly string[]; offset: number }>();
    for (const range of ranges) {
        range.forEach((member, offset) => {
            const canonical = licenseIndex.get(member.toLowerCase());
            if (!canonical || canonical.id !== member) {
                throw createInvalidDataError(`range member '${member}' is not a registered license`, { range });
            }
            if (rangeIndex.has(member)) {
                throw createInvalidDataError(`license '${member}' appears in more than one range`, { range });
            }
            rangeIndex.set(member, { range, offset });
        });
    }

    const identifiers = licenses.map(l => l.id);

    return {
        licenses: () => licenses,
        licenseIdentifiers: () => identifiers,
        mkLicenseId: text => licenseIndex.get(text.toLowerCase())?.id,
        isOsiApproved: id => licenseIndex.get(id.toLowerCase())?.osiApproved ?? false,
        licenseExceptions: () => exceptions,
        mkLicenseExceptionId: text => exceptionIndex.get(text.toLowerCase())?.id,
        licenseRanges: () => ranges,
        lookupLicenseRange: id => {
            const entry = rangeIndex.get(id);
            return entry ? entry.range.slice(entry.offset) : [id];
        },
    };
}

function indexById<E extends { id: string }>(entries: readonly E[], kind: string): Map<string, E> {
    const index = new Map<string, E>();
    for (const entry of entries) {
        const key = entry.id.toLowerCase();
        if (index.has(key)) {
            throw createInvalidDataError(`duplicate ${kind} identifier '${entry.id}'`);
        }
        index.set(key, entry);
    }
    return index;
}

function formatIssue(issue: z.ZodIssue): string {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
}

export const defaultRegistry: LicenseRegistry = createLicenseRegistry(rawData);

export const licenses = (): readonly LicenseInfo[] => defaultRegistry.licenses();
export const licenseIdentifiers = (): readonly string[] => defaultRegistry.licenseIdentifiers();
export const mkLicenseId = (text: string): string | undefined => defaultRegistry.mkLicenseId(text);
export const isOsiApproved = (id: string): boolean => defaultRegistry.isOsiApproved(id);
export const licenseExceptions = (): readonly LicenseExceptionInfo[] => defaultRegistry.licenseExceptions();
export const mkLicenseExceptionId = (text: string): string | undefined => defaultRegistry.mkLicenseExceptionId(text);
export const licenseRanges = (): readonly (readonly string[])[] => defaultRegistry.licenseRanges();
export const lookupLicenseRange = (id: string): readonly string[] => defaultRegistry.lookupLicenseRange(id);
