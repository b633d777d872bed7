import { describe, it, expect } from 'vitest';
import { FollowErrorCodes, isFollowError, type FollowError } from '@filefollow/types';
import {
  verifyConfig,
  collectWarnings,
  cleanPath,
  parseConnectionTimeout,
  countTargets,
} from './validation.js';
import { emptyGlobalSection, type FollowerEntry, type RawConfig } from './schema.js';

function thrown(fn: () => unknown): FollowError {
  try {
    fn();
  } catch (error) {
    if (isFollowError(error)) return error;
    throw error;
  }
  throw new Error('expected a FollowError');
}

function follower(overrides: Partial<FollowerEntry> = {}): FollowerEntry {
  return {
    Base_Directory: '/var/log/app',
    File_Filter: '*.log',
    Tag_Name: 'app',
    Ignore_Timestamps: false,
    Assume_Local_Timezone: false,
    ...overrides,
  };
}

function validConfig(): RawConfig {
  return {
    Global: {
      ...emptyGlobalSection(),
      Ingest_Secret: 'test-secret',
      Cleartext_Backend_Target: ['10.0.0.1:4023'],
    },
    Follower: { app: follower() },
  };
}

describe('Configuration Validation', () => {
  describe('verifyConfig', () => {
    it('should accept a minimal valid config', () => {
      expect(verifyConfig(validConfig())).toEqual(validConfig());
    });

    it('should default an empty tag and clean the base directory', () => {
      const config = validConfig();
      config.Follower = { app: follower({ Tag_Name: '', Base_Directory: '/var/log/app/' }) };

      const result = verifyConfig(config);

      expect(result.Follower.app?.Tag_Name).toBe('default');
      expect(result.Follower.app?.Base_Directory).toBe('/var/log/app');
    });

    it('should not mutate its input', () => {
      const config = validConfig();
      config.Follower = { app: follower({ Tag_Name: '', Base_Directory: '/var//log/./app/' }) };

      verifyConfig(config);

      expect(config.Follower.app?.Tag_Name).toBe('');
      expect(config.Follower.app?.Base_Directory).toBe('/var//log/./app/');
    });

    it('should be idempotent', () => {
      const config = validConfig();
      config.Follower = {
        b: follower({ Tag_Name: '', Base_Directory: '/srv/b/../b/' }),
        a: follower({ Tag_Name: 'x' }),
      };

      const once = verifyConfig(config);
      const twice = verifyConfig(once);

      expect(twice).toEqual(once);
      expect(Object.keys(twice.Follower)).toEqual(['a', 'b']);
    });

    it('should order followers by name', () => {
      const config = validConfig();
      config.Follower = { zeta: follower(), alpha: follower(), Mid: follower() };

      expect(Object.keys(verifyConfig(config).Follower)).toEqual(['Mid', 'alpha', 'zeta']);
    });

    it('should treat a blank timeout as no timeout', () => {
      const config = validConfig();
      config.Global.Connection_Timeout = '   ';

      expect(() => verifyConfig(config)).not.toThrow();
    });

    it('should reject an unparseable timeout', () => {
      const config = validConfig();
      config.Global.Connection_Timeout = 'soon';

      const error = thrown(() => verifyConfig(config));
      expect(error.code).toBe(FollowErrorCodes.INVALID_TIMEOUT);
      expect(error.message).toBe('Invalid connection timeout: invalid duration "soon"');
    });

    it('should reject a negative timeout', () => {
      const config = validConfig();
      config.Global.Connection_Timeout = '-5s';

      const error = thrown(() => verifyConfig(config));
      expect(error.code).toBe(FollowErrorCodes.INVALID_TIMEOUT);
    });

    it('should reject a missing secret', () => {
      const config = validConfig();
      config.Global.Ingest_Secret = '';

      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.MISSING_SECRET);
    });

    it('should reject a config without backend targets', () => {
      const config = validConfig();
      config.Global.Cleartext_Backend_Target = [];

      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.NO_BACKEND_TARGETS);
    });

    it('should accept pipe targets alone', () => {
      const config = validConfig();
      config.Global.Cleartext_Backend_Target = [];
      config.Global.Pipe_Backend_Target = ['/run/ingest.sock'];

      expect(() => verifyConfig(config)).not.toThrow();
    });

    it('should reject a config without followers', () => {
      const config = validConfig();
      config.Follower = {};

      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.NO_FOLLOWERS);
    });

    it('should name the follower missing a base directory', () => {
      const config = validConfig();
      config.Follower = { app: follower(), web: follower({ Base_Directory: '' }) };

      const error = thrown(() => verifyConfig(config));
      expect(error.code).toBe(FollowErrorCodes.MISSING_BASE_DIRECTORY);
      expect(error.message).toBe('No Base-Directory provided for web');
      expect(error.details).toEqual({ follower: 'web' });
    });

    it('should name the follower and tag with forbidden characters', () => {
      const config = validConfig();
      config.Follower = { app: follower({ Tag_Name: 'bad tag!' }) };

      const error = thrown(() => verifyConfig(config));
      expect(error.code).toBe(FollowErrorCodes.INVALID_TAG_NAME);
      expect(error.message).toBe('Invalid characters in the Tag-Name for app: "bad tag!"');
      expect(error.details).toEqual({ forbidden: ' ', follower: 'app', tag: 'bad tag!' });
    });

    it('should report the first invalid follower in name order', () => {
      const config = validConfig();
      config.Follower = {
        zulu: follower({ Base_Directory: '' }),
        bravo: follower({ Tag_Name: 'a.b' }),
      };

      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.INVALID_TAG_NAME);
    });

    it('should check rules in order', () => {
      const config = validConfig();
      config.Global.Connection_Timeout = 'bogus';
      config.Global.Ingest_Secret = '';
      config.Follower = {};

      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.INVALID_TIMEOUT);

      config.Global.Connection_Timeout = '';
      expect(thrown(() => verifyConfig(config)).code).toBe(FollowErrorCodes.MISSING_SECRET);
    });
  });

  describe('parseConnectionTimeout', () => {
    it('should parse durations to milliseconds', () => {
      expect(parseConnectionTimeout('30s')).toBe(30_000);
      expect(parseConnectionTimeout(' 2m ')).toBe(120_000);
      expect(parseConnectionTimeout('')).toBe(0);
    });
  });

  describe('cleanPath', () => {
    it.each([
      ['/var/log/app/', '/var/log/app'],
      ['/var//log/./app', '/var/log/app'],
      ['/var/log/../tmp/', '/var/tmp'],
      ['/', '/'],
      ['logs/', 'logs'],
      ['./', '.'],
    ])('cleans %s to %s', (input, expected) => {
      expect(cleanPath(input)).toBe(expected);
    });
  });

  describe('countTargets', () => {
    it('should count all three target lists', () => {
      const config = validConfig();
      config.Global.Encrypted_Backend_Target = ['a:4024', 'b:4024'];
      config.Global.Pipe_Backend_Target = ['/run/x.sock'];

      expect(countTargets(config)).toBe(4);
    });
  });

  describe('collectWarnings', () => {
    it('should return nothing for a clean config', () => {
      const config = validConfig();
      config.Global.Log_Level = 'warn';

      expect(collectWarnings(config)).toEqual([]);
    });

    it('should flag unknown log levels', () => {
      const config = validConfig();
      config.Global.Log_Level = 'chatty';

      expect(collectWarnings(config)).toEqual(['Unknown Log-Level "chatty", using INFO']);
    });

    it('should flag encrypted targets without certificate verification', () => {
      const config = validConfig();
      config.Global.Encrypted_Backend_Target = ['10.0.0.5:4024'];

      expect(collectWarnings(config)).toEqual([
        'Encrypted backend targets configured with Verify-Remote-Certificates disabled',
      ]);
    });

    it('should flag duplicate targets and empty file filters', () => {
      const config = validConfig();
      config.Global.Cleartext_Backend_Target = ['10.0.0.1:4023', '10.0.0.1:4023'];
      config.Follower = { app: follower({ File_Filter: '' }) };

      expect(collectWarnings(config)).toEqual([
        'Duplicate Cleartext-Backend-Target "10.0.0.1:4023"',
        'Follower "app" has an empty File-Filter',
      ]);
    });
  });
});
