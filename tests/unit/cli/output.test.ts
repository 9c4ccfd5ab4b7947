/**
 * Unit tests for the CLI output layer
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { installSteps, OutputFormatter } from '../../../src/cli/output.js';
import { ConfigError, HardwareFactError } from '../../../src/core/errors.js';
import { generateArtifact } from '../../../src/core/generator.js';
import { listProfiles } from '../../../src/rules/profiles/index.js';
import { makeFacts } from '../../helpers/facts.js';

describe('installSteps', () => {
  it('should review, copy, then apply', () => {
    assert.deepStrictEqual(installSteps('/root/sysctl-suggestion.conf', '/etc/sysctl.conf'), [
      'Review the configuration: less /root/sysctl-suggestion.conf',
      'Copy it to system location: sudo cp /root/sysctl-suggestion.conf /etc/sysctl.conf',
      'Apply the settings: sudo sysctl -p /etc/sysctl.conf',
    ]);
  });
});

describe('OutputFormatter (JSON mode)', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  const artifact = generateArtifact({
    facts: makeFacts(),
    profile: 'general',
    disableIpv6: false,
    installPath: '/etc/sysctl.conf',
    generatedAt: new Date(2026, 0, 2, 3, 4, 5),
  });

  it('should record a written artifact without its content', () => {
    const output = new OutputFormatter('generate', { json: true });

    output.generated(artifact, '/tmp/sysctl.conf', '/etc/sysctl.conf');
    const result = output.getResult();

    assert.strictEqual(result.success, true);
    assert.strictEqual(result.profile, 'general');
    assert.strictEqual(result.disableIpv6, false);
    assert.strictEqual(result.output, '/tmp/sysctl.conf');
    assert.strictEqual(result.digest, artifact.digest);
    assert.strictEqual(result.settings?.length, artifact.resolved.entries.length);
    assert.strictEqual(result.content, undefined);
  });

  it('should include the content when printing instead of writing', () => {
    const output = new OutputFormatter('generate', { json: true });

    output.generated(artifact, null, '/etc/sysctl.conf');

    assert.strictEqual(output.getResult().output, null);
    assert.strictEqual(output.getResult().content, artifact.content);
  });

  it('should attach validation errors to the error details', () => {
    const output = new OutputFormatter('validate', { json: true });
    const error = new ConfigError(
      'Configuration validation failed: /srv/kerntune.yaml',
      'CONFIG_VALIDATION_FAILED',
      'Correct the fields listed below.',
      '/srv/kerntune.yaml',
      [{ path: '/profile', message: 'must be one of general, web' }]
    );

    output.error(error.message, error);

    assert.deepStrictEqual(output.getResult().error, {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed: /srv/kerntune.yaml',
      suggestion: 'Correct the fields listed below.',
      details: { errors: [{ path: '/profile', message: 'must be one of general, web' }] },
    });
    assert.strictEqual(output.getResult().success, false);
  });

  it('should leave details out for other errors', () => {
    const output = new OutputFormatter('generate', { json: true });
    const error = new HardwareFactError([{ field: 'cores', constraint: 'must be >= 1' }]);

    output.error(error.message, error);

    assert.strictEqual(output.getResult().error?.code, 'INVALID_HARDWARE_FACT');
    assert.strictEqual(output.getResult().error?.details, undefined);
  });

  it('should list profiles in menu order', () => {
    const output = new OutputFormatter('profiles', { json: true });

    output.profilesTable(listProfiles());

    assert.deepStrictEqual(output.getResult().profiles?.[3], {
      id: 'database',
      label: 'Database Server',
      description: 'Tuned for MySQL/PostgreSQL/etc.',
    });
  });

  it('should print nothing until flush, then one JSON document', () => {
    const log = mock.method(console, 'log', () => undefined);
    const output = new OutputFormatter('profiles', { json: true });

    output.info('not shown');
    output.success('not shown');
    assert.strictEqual(log.mock.callCount(), 0);

    output.flush();

    assert.strictEqual(log.mock.callCount(), 1);
    assert.deepStrictEqual(JSON.parse(String(log.mock.calls[0]?.arguments[0])), {
      success: true,
      command: 'profiles',
    });
  });
});

describe('OutputFormatter (human mode)', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should number the install steps and add container notes', () => {
    const log = mock.method(console, 'log', () => undefined);
    mock.method(console, 'warn', () => undefined);
    const output = new OutputFormatter('generate');

    output.instructions('/tmp/sysctl.conf', '/etc/sysctl.conf', true);

    const printed = log.mock.calls.map((call) => String(call.arguments[0] ?? ''));
    assert.ok(printed.includes('  1. Review the configuration: less /tmp/sysctl.conf'));
    assert.ok(printed.includes('  3. Apply the settings: sudo sysctl -p /etc/sysctl.conf'));
    assert.ok(printed.includes('  - Consider applying security-critical settings on the host system instead'));
  });
});
