/**
 * Token top-up computation
 *
 * Joins users to their companies, tops up every active user's balance by
 * the company's fixed amount and splits the results into users who would
 * be emailed and users who would not. Pure: no I/O, inputs are not mutated.
 */

import type {
  Company,
  CompanyResult,
  ProcessedUser,
  TopUpStats,
  User,
} from '../contracts/index.js';

// Code-point order (the same as UTF-8 byte order), independent of the host locale.
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }

  return left.length === right.length ? 0 : left.length < right.length ? -1 : 1;
}

export function sortCompaniesById(companies: readonly Company[]): Company[] {
  return [...companies].sort((a, b) => a.id - b.id);
}

export function sortUsersByLastName(users: readonly User[]): User[] {
  return [...users].sort((a, b) => compareCodePoints(a.last_name, b.last_name));
}

/**
 * Group users by company id. Each group is ordered by last name; users
 * sharing a last name keep their input order.
 */
export function groupUsersByCompany(users: readonly User[]): ReadonlyMap<number, readonly User[]> {
  const groups = new Map<number, User[]>();

  for (const user of sortUsersByLastName(users)) {
    const group = groups.get(user.company_id);
    if (group) {
      group.push(user);
    } else {
      groups.set(user.company_id, [user]);
    }
  }

  return groups;
}

export function isEmailEligible(company: Company, user: User): boolean {
  return company.email_status && user.email_status;
}

function processCompany(company: Company, group: readonly User[]): CompanyResult {
  const emailed: ProcessedUser[] = [];
  const notEmailed: ProcessedUser[] = [];
  let totalTopUps = 0;

  for (const user of group) {
    if (!user.active_status) continue;

    const processed: ProcessedUser = { ...user, new_balance: user.tokens + company.top_up };
    totalTopUps += company.top_up;

    if (isEmailEligible(company, user)) {
      emailed.push(processed);
    } else {
      notEmailed.push(processed);
    }
  }

  return { company, emailed, not_emailed: notEmailed, total_top_ups: totalTopUps };
}

/**
 * Compute per-company top-up results, ordered by company id.
 * Companies without any active matching user are left out entirely, and
 * users whose company_id matches no company are ignored.
 */
export function processTopUps(users: readonly User[], companies: readonly Company[]): CompanyResult[] {
  const groups = groupUsersByCompany(users);
  const results: CompanyResult[] = [];

  for (const company of sortCompaniesById(companies)) {
    const result = processCompany(company, groups.get(company.id) ?? []);
    if (result.emailed.length === 0 && result.not_emailed.length === 0) continue;
    results.push(result);
  }

  return results;
}

export function summarizeTopUps(results: readonly CompanyResult[]): TopUpStats {
  const stats: TopUpStats = {
    companies: results.length,
    users_emailed: 0,
    users_not_emailed: 0,
    total_top_ups: 0,
  };

  for (const result of results) {
    stats.users_emailed += result.emailed.length;
    stats.users_not_emailed += result.not_emailed.length;
    stats.total_top_ups += result.total_top_ups;
  }

  return stats;
}
