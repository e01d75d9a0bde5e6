/**
 * Pure registry algorithm tests: versions and constraints, presigned URLs
 * and search scoring.
 */

import { describe, it, expect } from 'vitest';
import {
  isValidModuleVersion,
  latestStableVersion,
  parseConstraint,
  parseModuleVersion,
  resolveConstraint,
  satisfiesConstraint,
  sortVersionsDescending,
} from '../src/versions/index.js';
import { UrlSigner } from '../src/presign/index.js';
import {
  matchesToken,
  rankCandidates,
  scoreCandidate,
  scoreToken,
  tokenizeQuery,
  type SearchFields,
} from '../src/search/index.js';
import { InvalidInputError } from '../src/utils/errors.js';

describe('module versions', () => {
  it('should accept strict semver', () => {
    expect(parseModuleVersion('1.2.3')).toEqual({ version: '1.2.3', beta: false, major: 1, minor: 2, patch: 3 });
    expect(parseModuleVersion('2.0.0-rc.1').beta).toBe(true);
  });

  it.each(['v1.2.3', '1.2', '1', ' 1.2.3', '1.2.3 ', '01.2.3', 'latest'])('should reject %s', version => {
    expect(isValidModuleVersion(version)).toBe(false);
    expect(() => parseModuleVersion(version)).toThrow(InvalidInputError);
  });

  it('should sort descending with pre-releases below their release', () => {
    expect(sortVersionsDescending(['1.0.0', '1.10.0', '1.2.0', '1.10.0-beta', '0.9.9'])).toEqual([
      '1.10.0',
      '1.10.0-beta',
      '1.2.0',
      '1.0.0',
      '0.9.9',
    ]);
  });
});

describe('version constraints', () => {
  const versions = ['0.9.0', '1.0.0', '1.2.0', '1.2.5', '1.3.0', '2.0.0', '2.1.0-beta'];

  function allowed(raw: string): string[] {
    const constraint = parseConstraint(raw);
    return versions.filter(version => satisfiesConstraint(version, constraint));
  }

  it('should treat a pessimistic two-part constraint as a minor range', () => {
    expect(allowed('~> 1.2')).toEqual(['1.2.0', '1.2.5', '1.3.0']);
  });

  it('should treat a pessimistic three-part constraint as a patch range', () => {
    expect(allowed('~> 1.2.3')).toEqual(['1.2.5']);
  });

  it('should intersect comma-separated parts', () => {
    expect(allowed('>= 1.0.0, < 2.0.0, != 1.2.0')).toEqual(['1.0.0', '1.2.5', '1.3.0']);
  });

  it('should read a bare version as equality', () => {
    expect(allowed('1.2.0')).toEqual(['1.2.0']);
    expect(allowed('=1.2.0')).toEqual(['1.2.0']);
  });

  it('should only match pre-releases when a part names one', () => {
    expect(allowed('>= 2.0.0')).toEqual(['2.0.0']);
    expect(allowed('>= 2.1.0-alpha')).toEqual(['2.1.0-beta']);
  });

  it('should match every release for an empty constraint', () => {
    expect(allowed('')).toEqual(['0.9.0', '1.0.0', '1.2.0', '1.2.5', '1.3.0', '2.0.0']);
  });

  it('should resolve to the highest match', () => {
    expect(resolveConstraint(versions, parseConstraint('~> 1.0'))).toBe('1.3.0');
    expect(resolveConstraint(versions, parseConstraint('> 5.0.0'))).toBeNull();
    expect(latestStableVersion(versions)).toBe('2.0.0');
    expect(latestStableVersion(['1.0.0-beta'])).toBeNull();
  });

  it('should reject malformed constraints', () => {
    expect(() => parseConstraint('>> 1.0')).toThrow(InvalidInputError);
    expect(() => parseConstraint('1.0-beta')).toThrow(InvalidInputError);
    expect(() => parseConstraint('1.0.0,')).toThrow(InvalidInputError);
  });
});

describe('UrlSigner', () => {
  const secret = Buffer.from('test-secret');
  let nowSeconds = 1_700_000_000;
  const signer = new UrlSigner({ secret, maxLifetimeSeconds: 300, clock: () => new Date(nowSeconds * 1000) });
  const path = '/v1/terrareg/modules/platform/vpc/aws/1.0.0/source.tar.gz';

  function queryOf(signed: string): { ts?: string; exp?: string; sig?: string } {
    const params = new URLSearchParams(signed.slice(signed.indexOf('?') + 1));
    return {
      ts: params.get('ts') ?? undefined,
      exp: params.get('exp') ?? undefined,
      sig: params.get('sig') ?? undefined,
    };
  }

  it('should sign a path with ts, exp and sig', () => {
    nowSeconds = 1_700_000_000;
    const signed = signer.signPath(path);
    expect(signed.startsWith(`${path}?ts=1700000000&exp=1700000300&sig=`)).toBe(true);
    expect(signer.verify(path, queryOf(signed))).toEqual({ valid: true });
  });

  it('should accept until exp inclusive and reject after', () => {
    nowSeconds = 1_700_000_000;
    const query = queryOf(signer.signPath(path));
    nowSeconds = 1_700_000_300;
    expect(signer.verify(path, query)).toEqual({ valid: true });
    nowSeconds = 1_700_000_301;
    expect(signer.verify(path, query)).toEqual({ valid: false, reason: 'expired' });
  });

  it('should cap the requested lifetime', () => {
    nowSeconds = 1_700_000_000;
    expect(signer.sign(path, 3600)).toMatchObject({ ts: 1_700_000_000, exp: 1_700_000_300 });
  });

  it('should reject a signature for another path', () => {
    nowSeconds = 1_700_000_000;
    const query = queryOf(signer.signPath(path));
    expect(signer.verify(`${path}x`, query)).toEqual({ valid: false, reason: 'bad_signature' });
  });

  it('should reject a stretched lifetime even with a valid signature', () => {
    nowSeconds = 1_700_000_000;
    const sig = signer.signature(path, 1_700_000_000, 1_700_000_301);
    expect(signer.verify(path, { ts: '1700000000', exp: '1700000301', sig })).toEqual({
      valid: false,
      reason: 'lifetime_exceeded',
    });
  });

  it('should reject a modified exp', () => {
    nowSeconds = 1_700_000_000;
    const query = queryOf(signer.signPath(path));
    expect(signer.verify(path, { ...query, exp: '1700000299' })).toEqual({ valid: false, reason: 'bad_signature' });
  });

  it('should reject malformed parameters', () => {
    expect(signer.verify(path, {})).toEqual({ valid: false, reason: 'malformed' });
    expect(signer.verify(path, { ts: '1', exp: '2', sig: 'zz' })).toEqual({ valid: false, reason: 'malformed' });
    expect(signer.verify(path, { ts: '-1', exp: '2', sig: 'a'.repeat(64) })).toEqual({
      valid: false,
      reason: 'malformed',
    });
  });
});

describe('search scoring', () => {
  function fields(overrides: Partial<SearchFields>): SearchFields {
    return {
      namespace: 'platform',
      module: 'vpc',
      provider: 'aws',
      description: null,
      owner: null,
      publishedAt: '2026-01-01T00:00:00Z',
      ...overrides,
    };
  }

  it('should lower-case and split the query', () => {
    expect(tokenizeQuery('  VPC   Network ')).toEqual(['vpc', 'network']);
  });

  it('should score a token by the first rule it meets', () => {
    expect(scoreToken('vpc', fields({}))).toBe(20);
    expect(scoreToken('platform', fields({}))).toBe(18);
    expect(scoreToken('aws', fields({}))).toBe(14);
    expect(scoreToken('networking', fields({ description: 'Networking' }))).toBe(13);
    expect(scoreToken('netops', fields({ owner: 'netops' }))).toBe(12);
    expect(scoreToken('vp', fields({}))).toBe(5);
    expect(scoreToken('subnet', fields({ description: 'VPC with subnets' }))).toBe(4);
    expect(scoreToken('ops', fields({ owner: 'netops' }))).toBe(3);
    expect(scoreToken('plat', fields({}))).toBe(2);
    expect(scoreToken('gcp', fields({}))).toBe(0);
  });

  it('should use the highest rule when several apply', () => {
    // module exact (20) wins over namespace exact (18)
    expect(scoreToken('core', fields({ namespace: 'core', module: 'core' }))).toBe(20);
  });

  it('should sum token scores', () => {
    expect(scoreCandidate(['vpc', 'aws'], fields({}))).toBe(34);
  });

  it('should match provider only exactly', () => {
    expect(matchesToken('aws', fields({}))).toBe(true);
    expect(matchesToken('aw', fields({}))).toBe(false);
    expect(matchesToken('pc', fields({}))).toBe(true);
  });

  it('should order by score, then recency, then name', () => {
    const items = [
      fields({ namespace: 'b', module: 'vpc-peering', publishedAt: '2026-01-02T00:00:00Z' }),
      fields({ namespace: 'a', module: 'vpc-peering', publishedAt: '2026-01-02T00:00:00Z' }),
      fields({ namespace: 'c', module: 'vpc-endpoint', publishedAt: '2026-01-03T00:00:00Z' }),
      fields({ namespace: 'd', module: 'vpc' }),
      fields({ namespace: 'e', module: 'dns' }),
    ];
    const ranked = rankCandidates(items, 'vpc', item => item);
    expect(ranked.map(result => `${result.item.namespace}:${result.score}`)).toEqual([
      'd:20',
      'c:5',
      'a:5',
      'b:5',
    ]);
  });

  it('should require every token to match', () => {
    const ranked = rankCandidates([fields({}), fields({ provider: 'google' })], 'vpc aws', item => item);
    expect(ranked).toHaveLength(1);
    expect(ranked[0]?.item.provider).toBe('aws');
  });
});
