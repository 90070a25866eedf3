/**
 * Validation Rule Engine
 *
 * Deterministic completeness and consistency checks over extracted fields.
 * Each check appends at most one issue; issue order follows check order.
 */

import type { ValidationSettings } from '../config';
import type { FieldName, FieldSet, Issue, RuleVerdict } from '../types';
import { isFilled } from '../analysis/field-extractor';
import { checkDateRange, isValidTimeRange } from './date-time';

export const RULE_MESSAGES = {
  missingField: (field: FieldName) => `Field '${field}' is missing`,
  emailDomain: (domain: string) => `Email must use the ${domain} domain`,
  invalidNik: 'NIK must be numeric with at least 5 digits',
  dateRangeFormat: 'DateRange format is invalid',
  dateRangeOrder: 'DateRange is not logical (start is not before end)',
  timeRangeFormat: 'TimeRange format is invalid',
  vpnUserMismatch: 'VPNUser does not match the requester name',
  signatureInsufficient: 'Signature requirement not met',
} as const;

const MIN_NIK_LENGTH = 5;

export class ValidationRuleEngine {
  constructor(private readonly settings: Pick<ValidationSettings, 'requiredFields' | 'requiredEmailDomain'>) {}

  evaluate(fields: FieldSet, signatureValid: boolean): RuleVerdict {
    const issues: Issue[] = [];
    const missingFields: FieldName[] = [];
    const present = (name: FieldName): string | null => {
      const value = fields[name];
      return isFilled(value) ? value.trim() : null;
    };

    // 1. Completeness
    for (const name of this.settings.requiredFields) {
      if (!present(name)) {
        issues.push({ message: RULE_MESSAGES.missingField(name), field: name });
        missingFields.push(name);
      }
    }

    // 2. Company email domain
    const email = present('Email');
    if (email && !email.includes(this.settings.requiredEmailDomain)) {
      issues.push({ message: RULE_MESSAGES.emailDomain(this.settings.requiredEmailDomain), field: 'Email' });
    }

    // 3. NIK
    const nik = present('NIK');
    if (nik && !(/^\d+$/.test(nik) && nik.length >= MIN_NIK_LENGTH)) {
      issues.push({ message: RULE_MESSAGES.invalidNik, field: 'NIK' });
    }

    // 4. Date range
    const dateRange = present('DateRange');
    if (dateRange) {
      const check = checkDateRange(dateRange);
      if (check === 'invalid_format') {
        issues.push({ message: RULE_MESSAGES.dateRangeFormat, field: 'DateRange' });
      } else if (check === 'not_ordered') {
        issues.push({ message: RULE_MESSAGES.dateRangeOrder, field: 'DateRange' });
      }
    }

    // 5. Time range (format only)
    const timeRange = present('TimeRange');
    if (timeRange && !isValidTimeRange(timeRange)) {
      issues.push({ message: RULE_MESSAGES.timeRangeFormat, field: 'TimeRange' });
    }

    // 6. VPN user must contain the requester name
    const name = present('Name');
    const vpnUser = present('VPNUser');
    if (name && vpnUser && !vpnUser.includes(name)) {
      issues.push({ message: RULE_MESSAGES.vpnUserMismatch, field: 'VPNUser' });
    }

    // 7. Signatures
    if (!signatureValid) {
      issues.push({ message: RULE_MESSAGES.signatureInsufficient });
    }

    return {
      issues,
      preliminaryValid: issues.length === 0 && signatureValid,
      missingFields,
    };
  }
}
