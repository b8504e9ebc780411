// src/journal/recordExtractor.ts
import { MarkupFragment } from '../utils/markupFragment';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import {
    ExtractionContext,
    ExtractionOutcome,
    FieldWarning,
    JournalRecord,
    journalRecordSchema,
} from '../types/journal.types';
import {
    ACCREDITED_BADGE,
    AFFILIATION_CONTAINER,
    ANCHOR,
    COVER_IMAGE,
    GARUDA_LINK,
    IDENTIFIERS_CONTAINER,
    LINKS_CONTAINER,
    NAME_CONTAINER,
    SCOPUS_BADGE,
    STATISTICS_CONTAINER,
    STATISTICS_ROW,
    STATISTIC_LABEL,
    STATISTIC_VALUE,
    STATUS_CONTAINER,
} from './listingMarkers';

type NameFields = Pick<JournalRecord, 'journal_id' | 'journal_name' | 'profile_url'>;
type LinkFields = Pick<JournalRecord, 'google_scholar_url' | 'website_url' | 'editor_url'>;
type AffiliationFields = Pick<JournalRecord, 'affiliation' | 'affiliation_url'>;
type IdentifierFields = Pick<JournalRecord, 'p_issn' | 'e_issn' | 'subject_area'>;
type StatusFields = Pick<JournalRecord, 'accreditation' | 'is_scopus_indexed' | 'is_garuda_indexed' | 'garuda_url'>;
type StatisticFields = Pick<JournalRecord, 'impact_score' | 'h5_index' | 'citations_5yr' | 'citations_total'>;

export type LinkCategory = 'scholar' | 'editor' | 'website';

const PROFILE_ID_PATTERN = /\/profile\/(\d+)/;
const P_ISSN_PATTERN = /P-ISSN\s*:\s*(\d+)/;
const E_ISSN_PATTERN = /E-ISSN\s*:\s*(\d+)/;
const SUBJECT_AREA_PATTERN = /Subject Area\s*:\s*([^|]+)/;
const ACCREDITATION_PATTERN = /(S\d+)/;
// `el-globe` as a whole class token, so `el-globe-alt` does not count.
const GLOBE_ICON_PATTERN = /(?:^|[\s"'])el-globe(?![\w-])/;

/**
 * Runs one field-group lookup. A throwing lookup degrades the group to its
 * defaults and leaves a warning behind.
 */
function attempt<T>(group: string, defaults: T, warnings: FieldWarning[], lookup: () => T): T {
    try {
        return lookup();
    } catch (error) {
        warnings.push({ field: group, message: getErrorMessageAndStack(error).message });
        return defaults;
    }
}

export function journalIdFromProfileUrl(profileUrl: string): string {
    return PROFILE_ID_PATTERN.exec(profileUrl)?.[1] ?? '';
}

/**
 * Category of one link from the links container, or null when it fits none.
 * Rules are checked scholar, editor, website.
 */
export function classifyLink(href: string, text: string, markup: string): LinkCategory | null {
    if (href.includes('scholar.google')) {
        return 'scholar';
    }
    if (text.includes('Editor URL') || markup.includes('el-globe-alt')) {
        return 'editor';
    }
    if (text.includes('Website') || GLOBE_ICON_PATTERN.test(markup)) {
        return 'website';
    }
    return null;
}

function readName(entry: MarkupFragment): NameFields {
    const link = entry.findFirst(NAME_CONTAINER)?.findFirst(ANCHOR);
    if (!link) {
        return { journal_id: '', journal_name: '', profile_url: '' };
    }
    const profileUrl = link.attr('href') ?? '';
    return {
        journal_id: journalIdFromProfileUrl(profileUrl),
        journal_name: link.text({ strip: true }),
        profile_url: profileUrl,
    };
}

function readLinks(entry: MarkupFragment): LinkFields {
    const found: Partial<Record<LinkCategory, string>> = {};
    const links = entry.findFirst(LINKS_CONTAINER)?.findAll(ANCHOR) ?? [];
    for (const link of links) {
        const href = link.attr('href') ?? '';
        const category = classifyLink(href, link.text({ strip: true }), link.outerMarkup());
        if (category && found[category] === undefined) {
            found[category] = href;
        }
    }
    return {
        google_scholar_url: found.scholar ?? '',
        website_url: found.website ?? '',
        editor_url: found.editor ?? '',
    };
}

function readAffiliation(entry: MarkupFragment): AffiliationFields {
    const link = entry.findFirst(AFFILIATION_CONTAINER)?.findFirst(ANCHOR);
    return {
        affiliation: link?.text({ strip: true }) ?? '',
        affiliation_url: link?.attr('href') ?? '',
    };
}

function readIdentifiers(entry: MarkupFragment): IdentifierFields {
    const text = entry.findFirst(IDENTIFIERS_CONTAINER)?.text() ?? '';
    return {
        p_issn: P_ISSN_PATTERN.exec(text)?.[1] ?? '',
        e_issn: E_ISSN_PATTERN.exec(text)?.[1] ?? '',
        subject_area: SUBJECT_AREA_PATTERN.exec(text)?.[1]?.trim() ?? '',
    };
}

function readStatus(entry: MarkupFragment): StatusFields {
    const status = entry.findFirst(STATUS_CONTAINER);
    const badgeText = status?.findFirst(ACCREDITED_BADGE)?.text({ strip: true }) ?? '';
    const garudaLink = status?.findFirst(GARUDA_LINK) ?? null;
    return {
        accreditation: ACCREDITATION_PATTERN.exec(badgeText)?.[1] ?? '',
        is_scopus_indexed: status?.findFirst(SCOPUS_BADGE) != null,
        is_garuda_indexed: garudaLink !== null,
        garuda_url: garudaLink?.attr('href') ?? '',
    };
}

/**
 * Labels and values are paired by position; pairing stops at the shorter list.
 */
function readStatistics(entry: MarkupFragment): StatisticFields {
    const fields: StatisticFields = { impact_score: '', h5_index: '', citations_5yr: '', citations_total: '' };
    const container = entry.findFirst(STATISTICS_CONTAINER);
    if (!container || !container.findFirst(STATISTICS_ROW)) {
        return fields;
    }
    const labels = container.findAll(STATISTIC_LABEL).map(label => label.text({ strip: true }));
    const values = container.findAll(STATISTIC_VALUE).map(value => value.text({ strip: true }));
    const pairs = Math.min(labels.length, values.length);

    for (let i = 0; i < pairs; i++) {
        const label = labels[i];
        const value = values[i];
        if (label.includes('Impact')) {
            fields.impact_score = value;
        } else if (label.includes('H5-index')) {
            fields.h5_index = value;
        } else if (label.includes('Citations 5yr')) {
            fields.citations_5yr = value;
        } else if (label.includes('Citations') && !label.includes('5yr')) {
            fields.citations_total = value;
        }
    }
    return fields;
}

function readCoverImage(entry: MarkupFragment): string {
    return entry.findFirst(COVER_IMAGE)?.attr('src') ?? '';
}

/**
 * Maps one candidate entry fragment to a `JournalRecord`. Never throws: missing
 * or broken sub-elements fall back to empty defaults, and the only failures are
 * an unreadable fragment or an assembled record the schema rejects.
 */
export function extractJournalRecord(entry: MarkupFragment, context: ExtractionContext): ExtractionOutcome {
    try {
        entry.outerMarkup();
    } catch (error) {
        return { ok: false, reason: { kind: 'fragment_unreadable', message: getErrorMessageAndStack(error).message } };
    }

    const warnings: FieldWarning[] = [];

    const name = attempt('name', { journal_id: '', journal_name: '', profile_url: '' }, warnings, () => readName(entry));
    const links = attempt('links', { google_scholar_url: '', website_url: '', editor_url: '' }, warnings, () => readLinks(entry));
    const affiliation = attempt('affiliation', { affiliation: '', affiliation_url: '' }, warnings, () => readAffiliation(entry));
    const identifiers = attempt('identifiers', { p_issn: '', e_issn: '', subject_area: '' }, warnings, () => readIdentifiers(entry));
    const status = attempt(
        'status',
        { accreditation: '', is_scopus_indexed: false, is_garuda_indexed: false, garuda_url: '' },
        warnings,
        () => readStatus(entry),
    );
    const statistics = attempt(
        'statistics',
        { impact_score: '', h5_index: '', citations_5yr: '', citations_total: '' },
        warnings,
        () => readStatistics(entry),
    );
    const coverImageUrl = attempt('cover_image', '', warnings, () => readCoverImage(entry));

    let extractedAt: string;
    try {
        extractedAt = (context.now ?? (() => new Date()))().toISOString();
    } catch (error) {
        return { ok: false, reason: { kind: 'schema_violation', message: `extracted_at: ${getErrorMessageAndStack(error).message}` } };
    }

    const parsed = journalRecordSchema.safeParse({
        journal_id: name.journal_id,
        journal_name: name.journal_name,
        profile_url: name.profile_url,
        google_scholar_url: links.google_scholar_url,
        website_url: links.website_url,
        editor_url: links.editor_url,
        affiliation: affiliation.affiliation,
        affiliation_url: affiliation.affiliation_url,
        p_issn: identifiers.p_issn,
        e_issn: identifiers.e_issn,
        subject_area: identifiers.subject_area,
        accreditation: status.accreditation,
        is_scopus_indexed: status.is_scopus_indexed,
        is_garuda_indexed: status.is_garuda_indexed,
        garuda_url: status.garuda_url,
        impact_score: statistics.impact_score,
        h5_index: statistics.h5_index,
        citations_5yr: statistics.citations_5yr,
        citations_total: statistics.citations_total,
        cover_image_url: coverImageUrl,
        source_page_sequence: context.sourcePageSequence,
        extraction_index: context.extractionIndex,
        extracted_at: extractedAt,
    });

    if (!parsed.success) {
        const message = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        return { ok: false, reason: { kind: 'schema_violation', message } };
    }
    return { ok: true, record: parsed.data, warnings };
}
