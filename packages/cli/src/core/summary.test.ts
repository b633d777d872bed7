import { describe, it, expect } from 'vitest';
import { FollowConfig, type RawConfig } from '@filefollow/config';
import { redactSecret, summarizeConfig } from './summary.js';

function rawConfig(overrides: Partial<RawConfig['Global']> = {}): RawConfig {
  return {
    Global: {
      State_Store_Location: '/var/lib/filefollow/state',
      Ingest_Secret: 'test-secret',
      Connection_Timeout: '90s',
      Verify_Remote_Certificates: true,
      Cleartext_Backend_Target: ['10.0.0.1:4023'],
      Encrypted_Backend_Target: ['ingest.example.test:4024'],
      Pipe_Backend_Target: [],
      Log_Level: '',
      Ingest_Cache_Path: '',
      ...overrides,
    },
    Follower: {
      syslog: {
        Base_Directory: '/var/log',
        File_Filter: 'syslog*',
        Tag_Name: 'syslog',
        Ignore_Timestamps: false,
        Assume_Local_Timezone: false,
      },
    },
  };
}

describe('redactSecret', () => {
  it('should mask a set secret', () => {
    expect(redactSecret('test-secret')).toBe('********');
  });

  it('should leave an empty secret empty', () => {
    expect(redactSecret('')).toBe('');
  });
});

describe('summarizeConfig', () => {
  it('should summarize a loaded configuration', () => {
    const summary = summarizeConfig(new FollowConfig(rawConfig()), '/etc/filefollow/file_follow.toml', [
      'a warning',
    ]);

    expect(summary).toEqual({
      config_path: '/etc/filefollow/file_follow.toml',
      secret: '********',
      targets: ['tcp://10.0.0.1:4023', 'tls://ingest.example.test:4024'],
      tags: ['syslog'],
      timeout: '1m30s',
      verify_remote: true,
      log_level: 'INFO',
      state_path: '/var/lib/filefollow/state',
      cache: { enabled: false, path: '' },
      followers: rawConfig().Follower,
      warnings: ['a warning'],
    });
  });

  it('should report no timeout when unset', () => {
    const summary = summarizeConfig(new FollowConfig(rawConfig({ Connection_Timeout: '' })), 'x');
    expect(summary.timeout).toBe('none');
  });

  it('should report the cache path when caching is enabled', () => {
    const summary = summarizeConfig(
      new FollowConfig(rawConfig({ Ingest_Cache_Path: '/var/cache/filefollow', Log_Level: 'debug' })),
      'x'
    );
    expect(summary.cache).toEqual({ enabled: true, path: '/var/cache/filefollow' });
    expect(summary.log_level).toBe('debug');
  });
});
