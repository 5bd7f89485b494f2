import { describe, it, expect } from 'vitest';
import {
  compareCodePoints,
  groupUsersByCompany,
  isEmailEligible,
  processTopUps,
  sortCompaniesById,
  summarizeTopUps,
} from '../topup/index.js';
import type { Company, User } from '../contracts/index.js';

function makeUser(overrides: Partial<User> & Pick<User, 'id' | 'last_name'>): User {
  return {
    first_name: 'First',
    email: `user${overrides.id}@example.com`,
    company_id: 1,
    email_status: true,
    active_status: true,
    tokens: 0,
    ...overrides,
  };
}

const acme: Company = { id: 1, name: 'Acme', top_up: 5, email_status: true };

describe('TopUp', () => {
  describe('scenarios', () => {
    it('tops up and classifies users of a single company', () => {
      const users = [
        makeUser({ id: 1, last_name: 'Zed', first_name: 'A', email: 'a@x.com', tokens: 10 }),
        makeUser({ id: 2, last_name: 'Ant', first_name: 'B', email: 'b@x.com', email_status: false, tokens: 20 }),
      ];

      const results = processTopUps(users, [acme]);

      expect(results).toHaveLength(1);
      expect(results[0].company).toEqual(acme);
      expect(results[0].emailed.map((u) => [u.last_name, u.new_balance])).toEqual([['Zed', 15]]);
      expect(results[0].not_emailed.map((u) => [u.last_name, u.new_balance])).toEqual([['Ant', 25]]);
      expect(results[0].total_top_ups).toBe(10);
    });

    it('leaves inactive users out of every list and the total', () => {
      const users = [
        makeUser({ id: 1, last_name: 'Active', tokens: 1 }),
        makeUser({ id: 2, last_name: 'Inactive', active_status: false, tokens: 2 }),
      ];

      const [result] = processTopUps(users, [acme]);

      expect(result.emailed.map((u) => u.id)).toEqual([1]);
      expect(result.not_emailed).toEqual([]);
      expect(result.total_top_ups).toBe(5);
    });

    it('ignores users whose company does not exist', () => {
      const users = [
        makeUser({ id: 1, last_name: 'Known' }),
        makeUser({ id: 2, last_name: 'Orphan', company_id: 99 }),
      ];

      const results = processTopUps(users, [acme]);

      const ids = results.flatMap((r) => [...r.emailed, ...r.not_emailed]).map((u) => u.id);
      expect(ids).toEqual([1]);
    });

    it('omits companies with no active users', () => {
      const idle: Company = { id: 2, name: 'Idle', top_up: 9, email_status: true };
      const empty: Company = { id: 3, name: 'Empty', top_up: 4, email_status: true };
      const users = [
        makeUser({ id: 1, last_name: 'Here' }),
        makeUser({ id: 2, last_name: 'Away', company_id: 2, active_status: false }),
      ];

      const results = processTopUps(users, [empty, idle, acme]);

      expect(results.map((r) => r.company.id)).toEqual([1]);
    });

    it('returns nothing for empty inputs', () => {
      expect(processTopUps([], [])).toEqual([]);
      expect(processTopUps([], [acme])).toEqual([]);
    });
  });

  describe('classification', () => {
    it('emails only when both the company and the user allow it', () => {
      const quiet: Company = { ...acme, email_status: false };
      const optedIn = makeUser({ id: 1, last_name: 'In', email_status: true });
      const optedOut = makeUser({ id: 2, last_name: 'Out', email_status: false });

      expect(isEmailEligible(acme, optedIn)).toBe(true);
      expect(isEmailEligible(acme, optedOut)).toBe(false);
      expect(isEmailEligible(quiet, optedIn)).toBe(false);
      expect(isEmailEligible(quiet, optedOut)).toBe(false);
    });

    it('places every active user in exactly one list', () => {
      const quiet: Company = { id: 2, name: 'Quiet', top_up: 1, email_status: false };
      const users = [
        makeUser({ id: 1, last_name: 'A', email_status: true }),
        makeUser({ id: 2, last_name: 'B', email_status: false }),
        makeUser({ id: 3, last_name: 'C', company_id: 2, email_status: true }),
        makeUser({ id: 4, last_name: 'D', company_id: 2, email_status: false }),
      ];

      const results = processTopUps(users, [acme, quiet]);

      const emailed = results.flatMap((r) => r.emailed.map((u) => u.id));
      const notEmailed = results.flatMap((r) => r.not_emailed.map((u) => u.id));
      expect(emailed).toEqual([1]);
      expect(notEmailed).toEqual([2, 3, 4]);
    });
  });

  describe('balances and totals', () => {
    it('sets new_balance to tokens plus the company top-up', () => {
      const beta: Company = { id: 2, name: 'Beta', top_up: 100, email_status: true };
      const users = [
        makeUser({ id: 1, last_name: 'A', tokens: 7 }),
        makeUser({ id: 2, last_name: 'B', tokens: -3, company_id: 2 }),
      ];

      const results = processTopUps(users, [acme, beta]);

      expect(results[0].emailed[0].new_balance).toBe(12);
      expect(results[1].emailed[0].new_balance).toBe(97);
    });

    it('totals top_up times the number of active users', () => {
      const users = [1, 2, 3, 4].map((id) =>
        makeUser({ id, last_name: `L${id}`, active_status: id !== 4, email_status: id % 2 === 0 }),
      );

      const [result] = processTopUps(users, [acme]);

      expect(result.total_top_ups).toBe(15);
    });

    it('does not mutate the input users', () => {
      const users = [makeUser({ id: 1, last_name: 'Same', tokens: 3 })];

      processTopUps(users, [acme]);

      expect(users[0]).not.toHaveProperty('new_balance');
      expect(users[0].tokens).toBe(3);
    });
  });

  describe('ordering', () => {
    it('orders companies by ascending id', () => {
      const companies: Company[] = [
        { id: 10, name: 'Ten', top_up: 1, email_status: true },
        { id: 2, name: 'Two', top_up: 1, email_status: true },
        { id: 7, name: 'Seven', top_up: 1, email_status: true },
      ];
      const users = [10, 2, 7].map((companyId) => makeUser({ id: companyId, last_name: 'X', company_id: companyId }));

      expect(sortCompaniesById(companies).map((c) => c.id)).toEqual([2, 7, 10]);
      expect(processTopUps(users, companies).map((r) => r.company.id)).toEqual([2, 7, 10]);
    });

    it('orders users by last name, case-sensitively', () => {
      const users = [
        makeUser({ id: 1, last_name: 'adams' }),
        makeUser({ id: 2, last_name: 'Baker' }),
        makeUser({ id: 3, last_name: 'Abbot' }),
      ];

      const [result] = processTopUps(users, [acme]);

      expect(result.emailed.map((u) => u.last_name)).toEqual(['Abbot', 'Baker', 'adams']);
    });

    it('orders last names by code point beyond the basic plane', () => {
      const users = [
        makeUser({ id: 1, last_name: '\u{1D400}' }),
        makeUser({ id: 2, last_name: '\uFF21' }),
      ];

      const [result] = processTopUps(users, [acme]);

      expect(result.emailed.map((u) => u.id)).toEqual([2, 1]);
    });

    it('compares strings by code point', () => {
      expect(compareCodePoints('\uFF21', '\u{1D400}')).toBe(-1);
      expect(compareCodePoints('\u{1D400}', '\uFF21')).toBe(1);
      expect(compareCodePoints('Ab', 'Ab')).toBe(0);
      expect(compareCodePoints('Ab', 'Abc')).toBe(-1);
      expect(compareCodePoints('b', 'a')).toBe(1);
    });

    it('keeps input order for equal last names', () => {
      const users = [
        makeUser({ id: 3, last_name: 'Smith', first_name: 'C' }),
        makeUser({ id: 1, last_name: 'Smith', first_name: 'A' }),
        makeUser({ id: 2, last_name: 'Jones', first_name: 'B' }),
      ];

      const [result] = processTopUps(users, [acme]);

      expect(result.emailed.map((u) => u.id)).toEqual([2, 3, 1]);
    });

    it('groups users by company id', () => {
      const users = [
        makeUser({ id: 1, last_name: 'B', company_id: 5 }),
        makeUser({ id: 2, last_name: 'A', company_id: 5 }),
        makeUser({ id: 3, last_name: 'C', company_id: 6 }),
      ];

      const groups = groupUsersByCompany(users);

      expect([...groups.keys()]).toEqual([5, 6]);
      expect(groups.get(5)?.map((u) => u.id)).toEqual([2, 1]);
      expect(groups.get(6)?.map((u) => u.id)).toEqual([3]);
    });
  });

  describe('summarizeTopUps', () => {
    it('adds up counts and totals across companies', () => {
      const quiet: Company = { id: 2, name: 'Quiet', top_up: 4, email_status: false };
      const users = [
        makeUser({ id: 1, last_name: 'A' }),
        makeUser({ id: 2, last_name: 'B', email_status: false }),
        makeUser({ id: 3, last_name: 'C', company_id: 2 }),
      ];

      expect(summarizeTopUps(processTopUps(users, [acme, quiet]))).toEqual({
        companies: 2,
        users_emailed: 1,
        users_not_emailed: 2,
        total_top_ups: 14,
      });
    });
  });
});
