/**
 * VPN Request Form Field Patterns
 *
 * One pattern per form field: a label (Indonesian or English) followed by a
 * run of spaces/colons, then a capture of the value on the same line.
 * The capture class is what bounds the value, so e.g. a name stops at the
 * first digit or punctuation mark.
 */

import type { FieldName } from '../types';

// Spaces, tabs and colons only: a value never continues onto the next line
const SEPARATOR = String.raw`[ \t:]*`;

function labelled(labels: string[], capture: string): RegExp {
  return new RegExp(String.raw`\b(?:${labels.join('|')})${SEPARATOR}(${capture})`, 'i');
}

const LETTERS_AND_SPACES = String.raw`[A-Za-z][A-Za-z \t]*`;

export const FIELD_PATTERNS: Readonly<Record<FieldName, RegExp>> = {
  NIK: labelled(['NIK', 'Nomor Induk Karyawan'], String.raw`[A-Z0-9]+`),
  Name: labelled(['Nama', 'Name'], LETTERS_AND_SPACES),
  Phone: labelled([String.raw`No\.?\s*Tel`, 'Telepon', 'Phone'], String.raw`[0-9+(][0-9 \t\-+()]*`),
  Email: labelled(['Email', 'E-mail'], String.raw`[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}`),
  Department: labelled(['Departement', 'Departemen', 'Department', 'Dept'], LETTERS_AND_SPACES),
  Manager: labelled(['Manager', 'Atasan'], LETTERS_AND_SPACES),
  DateRange: labelled(['Range Tanggal', 'Date Range'], String.raw`[0-9][0-9A-Za-z \t\-/–]*`),
  TimeRange: labelled(['Range Waktu', 'Time Range'], String.raw`[0-9][0-9 \t\-:]*`),
  ApprovedBy: labelled(['Approved by', 'Disetujui oleh'], LETTERS_AND_SPACES),
  VPNUser: labelled(['User VPN', 'VPN User'], String.raw`[A-Za-z0-9][A-Za-z0-9 \t]*`),
};
