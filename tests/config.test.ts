import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, loadConfig, loadConfigFile } from '../src/config.js';

function tempConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'respondable-config-'));
  const file = path.join(dir, 'config.yaml');
  fs.writeFileSync(file, content);
  return file;
}

describe('loadConfig', () => {
  it('uses defaults without any environment', () => {
    assert.deepEqual(loadConfig({}), {
      bind: '127.0.0.1',
      port: 9087,
      logEnabled: true,
      logPath: path.join(process.cwd(), 'reports', 'respondable-http.log.jsonl'),
      invalidHeaders: 'fail'
    });
  });

  it('reads RESPONDABLE_* variables', () => {
    const config = loadConfig({
      RESPONDABLE_BIND: '0.0.0.0',
      RESPONDABLE_HTTP_PORT: '8080',
      RESPONDABLE_HTTP_LOG: '/tmp/http.jsonl',
      RESPONDABLE_HTTP_LOG_ENABLED: 'false',
      RESPONDABLE_INVALID_HEADERS: 'drop'
    });
    assert.equal(config.bind, '0.0.0.0');
    assert.equal(config.port, 8080);
    assert.equal(config.logPath, '/tmp/http.jsonl');
    assert.equal(config.logEnabled, false);
    assert.equal(config.invalidHeaders, 'drop');
  });

  it('rejects malformed values', () => {
    assert.throws(() => loadConfig({ RESPONDABLE_HTTP_PORT: 'abc' }), {
      name: 'ConfigError',
      message: 'RESPONDABLE_HTTP_PORT: invalid port "abc"'
    });
    assert.throws(() => loadConfig({ RESPONDABLE_INVALID_HEADERS: 'ignore' }), {
      name: 'ConfigError',
      message: `RESPONDABLE_INVALID_HEADERS: invalidHeaders must be 'fail' or 'drop', got "ignore"`
    });
    assert.throws(() => loadConfig({ RESPONDABLE_HTTP_LOG_ENABLED: 'maybe' }), ConfigError);
  });

  it('layers the YAML file under the environment', () => {
    const file = tempConfig([
      'server:',
      '  bind: 0.0.0.0',
      '  port: 7000',
      'log:',
      '  path: /var/log/respondable.jsonl',
      'responder:',
      '  invalidHeaders: drop',
      ''
    ].join('\n'));
    const config = loadConfig({ RESPONDABLE_CONFIG: file, RESPONDABLE_HTTP_PORT: '7001' });
    assert.equal(config.bind, '0.0.0.0');
    assert.equal(config.port, 7001);
    assert.equal(config.logPath, '/var/log/respondable.jsonl');
    assert.equal(config.invalidHeaders, 'drop');
    assert.equal(config.logEnabled, true);
  });

  it('fails on a missing config file', () => {
    assert.throws(() => loadConfig({ RESPONDABLE_CONFIG: '/nonexistent/respondable.yaml' }), {
      name: 'ConfigError',
      message: 'Config file not found: /nonexistent/respondable.yaml'
    });
  });
});

describe('loadConfigFile', () => {
  it('reads the shipped config', () => {
    assert.deepEqual(loadConfigFile(path.join('config', 'respondable.yaml')), {
      bind: '127.0.0.1',
      port: 9087,
      logEnabled: true,
      logPath: 'reports/respondable-http.log.jsonl',
      invalidHeaders: 'fail'
    });
  });

  it('treats an empty file as no overrides', () => {
    assert.deepEqual(loadConfigFile(tempConfig('')), {});
  });

  it('rejects a non-mapping document', () => {
    const file = tempConfig('- just\n- a list\n');
    assert.throws(() => loadConfigFile(file), { name: 'ConfigError', message: `${file}: expected a mapping at the top level` });
  });

  it('validates the policy in the file', () => {
    const file = tempConfig('responder:\n  invalidHeaders: sometimes\n');
    assert.throws(() => loadConfigFile(file), ConfigError);
  });
});
