// src/journal/__fixtures__/records.ts
import { JournalRecord } from '../../types/journal.types';

export function makeRecord(overrides: Partial<JournalRecord> = {}): JournalRecord {
    return {
        journal_id: '4321',
        journal_name: 'Jurnal X',
        profile_url: 'https://portal.example/journals/profile/4321',
        google_scholar_url: '',
        website_url: 'https://jurnal-x.example/',
        editor_url: '',
        affiliation: 'Universitas Contoh',
        affiliation_url: '',
        p_issn: '12345678',
        e_issn: '87654321',
        subject_area: 'Computer Science',
        accreditation: 'S2',
        is_scopus_indexed: false,
        is_garuda_indexed: true,
        garuda_url: 'https://garuda.example/journal/view/1',
        impact_score: '1.25',
        h5_index: '14',
        citations_5yr: '1,204',
        citations_total: '2,310',
        cover_image_url: '',
        source_page_sequence: 1,
        extraction_index: 1,
        extracted_at: '2026-02-01T00:00:00.000Z',
        ...overrides,
    };
}
