/**
 * Filter queries over parsed goroutines
 *
 * Syntax, terms AND-combined:
 * - state:chan (partial match, case-insensitive)
 * - wait:>5 (wait minutes comparison; also >=, <, <=, or a bare number)
 * - id:42, creator:1, locked:true
 * - -state:select (negation)
 * - unqualified terms, and terms with an unknown field, search the goroutine
 *   ID and its full stack
 */

import { fullStack, stackContains } from '../parser/frame.js';
import type { Goroutine } from '../parser/types.js';

export type FilterField = 'state' | 'wait' | 'id' | 'creator' | 'locked';

export interface FilterTerm {
  field?: FilterField; // undefined for text search
  value: string;
  operator: 'equals' | 'contains' | 'gt' | 'lt' | 'gte' | 'lte';
  negated: boolean;
}

export interface FilterQuery {
  rawQuery: string;
  terms: FilterTerm[];
  valid: boolean;
  error?: string;
}

const FIELDS: readonly FilterField[] = ['state', 'wait', 'id', 'creator', 'locked'];

function isFilterField(field: string): field is FilterField {
  return FIELDS.some(known => known === field);
}

export class FilterParser {
  parse(query: string): FilterQuery {
    const trimmedQuery = query.trim();
    if (!trimmedQuery) {
      return { rawQuery: query, terms: [], valid: true };
    }

    try {
      const terms = this.tokenize(trimmedQuery).map(token =>
        token.includes(':') ? this.parseFieldTerm(token) : this.parseTextTerm(token)
      );
      return { rawQuery: query, terms, valid: true };
    } catch (error) {
      return {
        rawQuery: query,
        terms: [],
        valid: false,
        error: error instanceof Error ? error.message : 'Parse error',
      };
    }
  }

  matchesGoroutine(goroutine: Goroutine, query: FilterQuery): boolean {
    if (!query.valid || query.terms.length === 0) {
      return true;
    }
    return query.terms.every(term => this.matchesTerm(goroutine, term));
  }

  private tokenize(query: string): string[] {
    return query.split(/\s+/).filter(token => token.length > 0);
  }

  private parseFieldTerm(token: string): FilterTerm {
    const negated = token.startsWith('-');
    const cleanToken = negated ? token.slice(1) : token;

    const colonIndex = cleanToken.indexOf(':');
    const field = cleanToken.slice(0, colonIndex);
    const valueStr = cleanToken.slice(colonIndex + 1);

    // Not a known field: "server.go:42" is a text search
    if (!isFilterField(field)) {
      return this.parseTextTerm(token);
    }
    if (!valueStr) {
      throw new Error(`Invalid field term: ${token}`);
    }

    if (field === 'state') {
      return { field, value: valueStr, operator: 'contains', negated };
    }
    if (field === 'locked') {
      if (valueStr !== 'true' && valueStr !== 'false') {
        throw new Error(`Invalid value for locked: ${valueStr}`);
      }
      return { field, value: valueStr, operator: 'equals', negated };
    }

    const { operator, value } = this.parseComparison(valueStr);
    if (!/^\d+$/.test(value)) {
      throw new Error(`Invalid number for ${field}: ${valueStr}`);
    }
    return { field, value, operator, negated };
  }

  private parseTextTerm(token: string): FilterTerm {
    const negated = token.startsWith('-');
    const value = negated ? token.slice(1) : token;

    if (!value) {
      throw new Error(`Empty search term: ${token}`);
    }

    return { field: undefined, value, operator: 'contains', negated };
  }

  private parseComparison(valueStr: string): { operator: FilterTerm['operator']; value: string } {
    if (valueStr.startsWith('>=')) {
      return { operator: 'gte', value: valueStr.slice(2) };
    } else if (valueStr.startsWith('<=')) {
      return { operator: 'lte', value: valueStr.slice(2) };
    } else if (valueStr.startsWith('>')) {
      return { operator: 'gt', value: valueStr.slice(1) };
    } else if (valueStr.startsWith('<')) {
      return { operator: 'lt', value: valueStr.slice(1) };
    }
    return { operator: 'equals', value: valueStr };
  }

  private matchesTerm(goroutine: Goroutine, term: FilterTerm): boolean {
    let matches = false;

    switch (term.field) {
      case 'state':
        matches = goroutine.state.toLowerCase().includes(term.value.toLowerCase());
        break;
      case 'wait':
        matches = this.compareNumeric(goroutine.waitMinutes, term.operator, term.value);
        break;
      case 'id':
        matches = this.compareNumeric(goroutine.id, term.operator, term.value);
        break;
      case 'creator':
        matches = goroutine.creatorId !== null && this.compareNumeric(goroutine.creatorId, term.operator, term.value);
        break;
      case 'locked':
        matches = goroutine.lockedToThread === (term.value === 'true');
        break;
      case undefined:
        // Search in goroutine ID and full stack
        matches = String(goroutine.id).includes(term.value) || stackContains(fullStack(goroutine), term.value);
        break;
    }

    return term.negated ? !matches : matches;
  }

  // Ids are int64; terms were checked to be digits
  private compareNumeric(actual: number | bigint, operator: FilterTerm['operator'], expectedValue: string): boolean {
    const actualValue = BigInt(actual);
    const numericExpected = BigInt(expectedValue);
    switch (operator) {
      case 'gt': return actualValue > numericExpected;
      case 'gte': return actualValue >= numericExpected;
      case 'lt': return actualValue < numericExpected;
      case 'lte': return actualValue <= numericExpected;
      case 'equals': return actualValue === numericExpected;
      case 'contains': return actualValue.toString().includes(expectedValue);
      default: return false;
    }
  }
}

/**
 * Goroutines matching both the search text (when given) and the filter query
 */
export function filterGoroutines(goroutines: Goroutine[], query: FilterQuery, search?: string): Goroutine[] {
  const parser = new FilterParser();
  return goroutines.filter(
    goroutine =>
      (search === undefined || stackContains(fullStack(goroutine), search)) &&
      parser.matchesGoroutine(goroutine, query)
  );
}
