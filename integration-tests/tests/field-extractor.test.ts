/**
 * Pattern-based field scraping
 */

import { FIELD_NAMES, FieldExtractor, extractField, fieldCompleteness, joinPageText } from '@vpncheck/shared';
import { pageText, vpnForm } from './helpers';

describe('FieldExtractor', () => {
  it('extracts every field of a complete form', () => {
    const extractor = new FieldExtractor(FIELD_NAMES);

    expect(extractor.extractFields(vpnForm())).toEqual({
      NIK: '12345678',
      Name: 'Budi Santoso',
      Phone: '0812-3456-7890',
      Email: 'budi.santoso@infomedia.co.id',
      Department: 'Network Operations',
      Manager: 'Siti Rahma',
      DateRange: '01 Jan 2024 – 31 Mar 2024',
      TimeRange: '08:00:00 - 17:00:00',
      ApprovedBy: 'Andi Wijaya',
      VPNUser: 'Budi Santoso',
    });
  });

  it('reads text joined with page markers', () => {
    const rawText = joinPageText([pageText(1, 'Nama : Budi Santoso'), pageText(2, 'Email : budi@infomedia.co.id')]);
    const fields = new FieldExtractor(['Name', 'Email']).extractFields(rawText);

    expect(fields).toEqual({ Name: 'Budi Santoso', Email: 'budi@infomedia.co.id' });
  });

  it('only returns the configured schema', () => {
    const fields = new FieldExtractor(['NIK', 'Email']).extractFields(vpnForm());
    expect(Object.keys(fields)).toEqual(['NIK', 'Email']);
  });

  it('uses null for an absent label', () => {
    const fields = new FieldExtractor(['Email', 'Manager']).extractFields(vpnForm({ without: ['Email'] }));
    expect(fields).toEqual({ Email: null, Manager: 'Siti Rahma' });
  });

  it('accepts English labels', () => {
    const text = ['Name: Jane Doe', 'Phone: +62 21 555 0100', 'Date Range: 02 Feb 2024 – 10 Feb 2024', 'VPN User: Jane Doe'].join(
      '\n'
    );

    expect(extractField(text, 'Name')).toBe('Jane Doe');
    expect(extractField(text, 'Phone')).toBe('+62 21 555 0100');
    expect(extractField(text, 'DateRange')).toBe('02 Feb 2024 – 10 Feb 2024');
    expect(extractField(text, 'VPNUser')).toBe('Jane Doe');
  });

  it('matches labels case-insensitively', () => {
    expect(extractField('EMAIL: ops@infomedia.co.id', 'Email')).toBe('ops@infomedia.co.id');
    expect(extractField('nik 998877', 'NIK')).toBe('998877');
  });

  it('keeps the first match', () => {
    expect(extractField('Manager : Siti Rahma\nManager : Joko', 'Manager')).toBe('Siti Rahma');
  });

  it('does not read a blank value from the next line', () => {
    expect(extractField('Nama :\nDepartemen : Finance', 'Name')).toBeNull();
  });

  it('stops a name at the first character outside its class', () => {
    expect(extractField('Nama : Budi Santoso (IT)', 'Name')).toBe('Budi Santoso');
  });
});

describe('fieldCompleteness', () => {
  it('is the share of filled schema fields', () => {
    expect(fieldCompleteness({ NIK: '123', Name: null, Email: '  ' }, ['NIK', 'Name', 'Email', 'Phone'])).toBe(0.25);
  });

  it('is 0 for an empty schema', () => {
    expect(fieldCompleteness({ NIK: '123' }, [])).toBe(0);
  });
});
