// src/journal/__fixtures__/listingMarkup.ts

export interface EntryMarkupOptions {
    name?: string;
    profileHref?: string;
    links?: string[];
    affiliation?: { text: string; href: string };
    identifiers?: string;
    accreditation?: string;
    scopus?: boolean;
    garudaHref?: string;
    statistics?: { labels: string[]; values: string[]; row?: boolean };
    coverSrc?: string;
}

export function entryMarkup(options: EntryMarkupOptions = {}): string {
    const parts: string[] = [];
    if (options.coverSrc !== undefined) {
        parts.push(`<div class="col-lg-1"><img class="img-thumbnail journal-cover" src="${options.coverSrc}"></div>`);
    }
    if (options.name !== undefined) {
        parts.push(`<div class="affil-name mb-3"><a href="${options.profileHref ?? ''}"> ${options.name} </a></div>`);
    }
    if (options.links) {
        parts.push(`<div class="affil-abbrev">${options.links.join(' ')}</div>`);
    }
    if (options.affiliation) {
        parts.push(`<div class="affil-loc mt-2"><a href="${options.affiliation.href}"><i class="el-bank"></i> ${options.affiliation.text}</a></div>`);
    }
    if (options.identifiers !== undefined) {
        parts.push(`<div class="profile-id mt-1">${options.identifiers}</div>`);
    }
    if (options.accreditation !== undefined || options.scopus || options.garudaHref !== undefined) {
        const badges: string[] = [];
        if (options.accreditation !== undefined) {
            badges.push(`<span class="num-stat accredited"><i class="el-bookmark"></i> ${options.accreditation} Accredited</span>`);
        }
        if (options.scopus) {
            badges.push('<span class="num-stat scopus-indexed">Scopus Indexed</span>');
        }
        if (options.garudaHref !== undefined) {
            badges.push(`<a href="${options.garudaHref}"><span class="num-stat garuda-indexed">Garuda Indexed</span></a>`);
        }
        parts.push(`<div class="stat-prev mt-2">${badges.join('')}</div>`);
    }
    if (options.statistics) {
        const { labels, values, row = true } = options.statistics;
        const numbers = values.map(value => `<div class="pr-num">${value}</div>`).join('');
        const texts = labels.map(label => `<div class="pr-txt">${label}</div>`).join('');
        const body = `${numbers}${texts}`;
        parts.push(`<div class="stat-profile journal-list-stat">${row ? `<div class="row no-gutters">${body}</div>` : body}</div>`);
    }
    return `<div class="list-item row mt-3">${parts.join('\n')}</div>`;
}

export function listingPageMarkup(entries: string[]): string {
    return [
        '<!DOCTYPE html>',
        '<html><head><title>Journals</title></head><body>',
        '<table class="table"><tbody><tr><td>Filter summary</td></tr></tbody></table>',
        '<div class="content">',
        ...entries,
        '</div>',
        '</body></html>',
    ].join('\n');
}

/**
 * The catalog entry used across the extraction and pipeline tests.
 */
export function sampleEntryMarkup(overrides: EntryMarkupOptions = {}): string {
    return entryMarkup({
        name: 'Jurnal X',
        profileHref: 'https://portal.example/journals/profile/4321',
        identifiers: 'P-ISSN : 12345678 | E-ISSN : 87654321 | Subject Area : Computer Science',
        accreditation: 'S2',
        ...overrides,
    });
}
