// src/journal/listingMarkers.ts
import { FragmentMarker } from '../utils/markupFragment';

// Structural markers of one catalog listing page.

export const CANDIDATE_ENTRY: FragmentMarker = { tag: 'div', classes: ['list-item', 'row', 'mt-3'] };

export const NAME_CONTAINER: FragmentMarker = { tag: 'div', classes: ['affil-name'] };
export const LINKS_CONTAINER: FragmentMarker = { tag: 'div', classes: ['affil-abbrev'] };
export const AFFILIATION_CONTAINER: FragmentMarker = { tag: 'div', classes: ['affil-loc'] };
export const IDENTIFIERS_CONTAINER: FragmentMarker = { tag: 'div', classes: ['profile-id'] };

export const STATUS_CONTAINER: FragmentMarker = { tag: 'div', classes: ['stat-prev'] };
export const ACCREDITED_BADGE: FragmentMarker = { tag: 'span', classes: ['num-stat', 'accredited'] };
export const SCOPUS_BADGE: FragmentMarker = { tag: 'span', classes: ['num-stat', 'scopus-indexed'] };
export const GARUDA_LINK: FragmentMarker = { tag: 'a', attributes: { href: /garuda/ } };

export const STATISTICS_CONTAINER: FragmentMarker = { tag: 'div', classes: ['stat-profile', 'journal-list-stat'] };
export const STATISTICS_ROW: FragmentMarker = { tag: 'div', classes: ['row', 'no-gutters'] };
export const STATISTIC_LABEL: FragmentMarker = { tag: 'div', classes: ['pr-txt'] };
export const STATISTIC_VALUE: FragmentMarker = { tag: 'div', classes: ['pr-num'] };

export const COVER_IMAGE: FragmentMarker = { tag: 'img', classes: ['journal-cover'] };

export const ANCHOR: FragmentMarker = { tag: 'a' };
