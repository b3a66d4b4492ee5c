import { describe, expect, it } from 'vitest';
import { createTestEngine } from '../helpers';

describe('prompty.env', () => {
  const env = { API_URL: 'http://localhost:8080', EMPTY: '' };

  it('reads a variable', async () => {
    const { engine } = createTestEngine({ env });
    expect(await engine.execute('{~prompty.env name="API_URL" /~}')).toBe('http://localhost:8080');
  });

  it.each([
    ['UNSET', 'fallback'],
    ['EMPTY', 'fallback'],
  ])('renders the default for %s', async (name, expected) => {
    const { engine } = createTestEngine({ env });
    expect(await engine.execute(`{~prompty.env name="${name}" default="fallback" /~}`)).toBe(expected);
  });

  it('renders nothing for an unset optional variable', async () => {
    const { engine } = createTestEngine({ env });
    expect(await engine.execute('[{~prompty.env name="UNSET" /~}]')).toBe('[]');
  });

  it('fails for an unset required variable', async () => {
    const { engine } = createTestEngine({ env });
    await expect(engine.execute('{~prompty.env name="UNSET" required="true" /~}')).rejects.toThrow(
      "required environment variable 'UNSET' is not set",
    );
  });

  it('prefers the default over required', async () => {
    const { engine } = createTestEngine({ env });
    expect(await engine.execute('{~prompty.env name="UNSET" required="true" default="d" /~}')).toBe('d');
  });

  it('validates required', async () => {
    const { engine } = createTestEngine({ env });
    await expect(engine.execute('{~prompty.env name="API_URL" required="maybe" /~}')).rejects.toThrow(
      `'required' must be "true" or "false", got 'maybe'`,
    );
  });
});
