import chalk from 'chalk';
import {
  formatBanner,
  formatInvalid,
  formatSummary,
  formatVerdict,
} from '../../src/utils/format';
import { InvalidDomainError } from '../../src/utils/errors';

describe('terminal formatting', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  it('marks verdicts by outcome', () => {
    expect(
      formatVerdict({ available: true, outcome: 'no_record', message: 'Domain a.com appears to be available' }),
    ).toBe('✓ Domain a.com appears to be available');
    expect(
      formatVerdict({ available: false, outcome: 'registered', message: 'Domain b.com is registered' }),
    ).toBe('✗ Domain b.com is registered');
    expect(
      formatVerdict({ available: false, outcome: 'lookup_failed', message: 'Error checking c.com: x' }),
    ).toBe('! Error checking c.com: x');
  });

  it('adds the retry hint under lookup problems', () => {
    expect(
      formatVerdict({
        available: false,
        outcome: 'lookup_failed',
        message: 'Error checking c.com: TimeoutError - Operation timed out',
        hint: 'Increase WHOIS_TIMEOUT_MS for slower registries.',
      }),
    ).toBe(
      '! Error checking c.com: TimeoutError - Operation timed out\n  Increase WHOIS_TIMEOUT_MS for slower registries.',
    );
  });

  it('explains invalid input', () => {
    const text = formatInvalid('bad', new InvalidDomainError('bad', 'No TLD found'));

    expect(text).toBe(
      'Invalid domain format: bad\nDomain should match pattern: example.com, sub.example.net, etc.',
    );
  });

  it('summarizes a session with available domains', () => {
    const text = formatSummary({
      checked: 3,
      availableCount: 2,
      available: ['free.com', 'gone.net'],
    });

    expect(text.split('\n')).toEqual([
      '',
      '=== Domain Lookup Summary ===',
      'Domains checked: 3',
      'Available domains found: 2',
      '',
      'Available Domains:',
      '  - free.com',
      '  - gone.net',
      '',
      'Thank you for using the Domain Availability Checker!',
    ]);
  });

  it('omits the list when nothing was available', () => {
    const text = formatSummary({ checked: 1, availableCount: 0, available: [] });

    expect(text).not.toContain('Available Domains:');
    expect(text).toContain('Domains checked: 1');
  });

  it('adds instructions to the interactive banner only', () => {
    expect(formatBanner(false)).toBe('\n=== Domain Availability Checker ===');
    expect(formatBanner(true)).toContain("type 'quit' or 'exit' to finish");
  });
});
