import { ExternalLookupError, ValidationError } from '../errors';
import {
  extract,
  findFacebookLinks,
  parseFacebookLink,
  parseUidArgument,
  resolve,
  resolveLinkResult,
} from '../extractor';
import type { FacebookProfile, ProfileLookup } from '../types';

function createLookup(resolveUsername: (username: string) => Promise<string>): ProfileLookup {
  return {
    resolveUsername: jest.fn(resolveUsername),
    getProfile: jest.fn<Promise<FacebookProfile>, [string]>(),
    pictureUrl: (uid: string) => `https://graph.example/${uid}/picture`,
  };
}

describe('extract', () => {
  it('should read the id of a profile.php link', () => {
    expect(extract('https://facebook.com/profile.php?id=1234567')).toBe('1234567');
  });

  it('should return null for text without links', () => {
    expect(extract('hello world')).toBeNull();
    expect(extract('')).toBeNull();
  });

  it.each([
    ['see m.facebook.com/profile.php?id=100012345678901&ref=bookmarks.', '100012345678901'],
    ['https://www.facebook.com/people/John-Doe/100004567890123/', '100004567890123'],
    ['https://facebook.com/4', '4'],
    ['https://web.facebook.com/groups/12345/user/100009876543210/', '100009876543210'],
    ['https://www.facebook.com/permalink.php?story_fbid=pfbid0abc&id=100001112223334', '100001112223334'],
    ['fb.com/profile.php?id=77', '77'],
    ['HTTPS://WWW.FACEBOOK.COM/profile.php?id=55', '55'],
    ['(https://facebook.com/profile.php?id=99)', '99'],
  ])('should extract from %p', (text, uid) => {
    expect(extract(text)).toBe(uid);
  });

  it.each([
    'https://www.facebook.com/zuck',
    'https://notfacebook.com/profile.php?id=1',
    'https://www.facebook.com/groups/somegroup',
    'https://www.facebook.com/watch?v=1',
    'https://www.facebook.com/',
    'facebook.com/profile.php?id=%%%',
    'https://facebook.com/profile.php?id=',
  ])('should return null for %p', (text) => {
    expect(extract(text)).toBeNull();
  });

  it('should skip vanity links and take the first numeric one', () => {
    expect(extract('https://facebook.com/jane.doe https://facebook.com/profile.php?id=5')).toBe('5');
  });
});

describe('parseFacebookLink', () => {
  it('should recognise vanity names', () => {
    expect(parseFacebookLink('https://www.facebook.com/zuck')).toEqual({
      kind: 'vanity',
      username: 'zuck',
      url: 'https://www.facebook.com/zuck',
    });
  });

  it('should add a scheme to bare links', () => {
    expect(parseFacebookLink('m.facebook.com/profile.php?id=8')).toEqual({
      kind: 'numeric',
      uid: '8',
      url: 'https://m.facebook.com/profile.php?id=8',
    });
  });
});

describe('findFacebookLinks', () => {
  it('should return every distinct link', () => {
    const links = findFacebookLinks(
      'a https://facebook.com/profile.php?id=1 b https://m.facebook.com/profile.php?id=1 c https://facebook.com/jane.doe'
    );

    expect(links).toEqual([
      { kind: 'numeric', uid: '1', url: 'https://facebook.com/profile.php?id=1' },
      { kind: 'vanity', username: 'jane.doe', url: 'https://facebook.com/jane.doe' },
    ]);
  });
});

describe('resolve', () => {
  it('should resolve vanity names through the lookup', async () => {
    const lookup = createLookup(async () => '100000000000001');

    await expect(resolve('https://facebook.com/jane.doe', lookup)).resolves.toBe('100000000000001');
    expect(lookup.resolveUsername).toHaveBeenCalledWith('jane.doe');
  });

  it('should return null when the lookup fails', async () => {
    const lookup = createLookup(async () => {
      throw new ExternalLookupError('timeout', true);
    });

    await expect(resolve('https://facebook.com/jane.doe', lookup)).resolves.toBeNull();
  });

  it('should return null for vanity links without a lookup', async () => {
    await expect(resolve('https://facebook.com/jane.doe')).resolves.toBeNull();
  });

  it('should fall through to the next link', async () => {
    const lookup = createLookup(async () => {
      throw new ExternalLookupError('not found', false);
    });

    await expect(resolve('https://facebook.com/ghost https://facebook.com/profile.php?id=5', lookup)).resolves.toBe(
      '5'
    );
  });

  it('should ignore non-numeric lookup results', async () => {
    const lookup = createLookup(async () => 'abc');

    await expect(resolve('https://facebook.com/jane.doe', lookup)).resolves.toBeNull();
  });
});

describe('resolveLinkResult', () => {
  it('should keep the transient flag of a failed lookup', async () => {
    const lookup = createLookup(async () => {
      throw new ExternalLookupError('timeout', true);
    });

    await expect(
      resolveLinkResult({ kind: 'vanity', username: 'jane.doe', url: 'https://facebook.com/jane.doe' }, lookup)
    ).resolves.toEqual({ ok: false, transient: true });
  });

  it('should reject ids longer than twenty digits', async () => {
    const lookup = createLookup(async () => '123456789012345678901');

    await expect(
      resolveLinkResult({ kind: 'vanity', username: 'ghost', url: 'https://facebook.com/ghost' }, lookup)
    ).resolves.toEqual({ ok: false, transient: false });
  });

  it('should rethrow unexpected errors', async () => {
    const lookup = createLookup(async () => {
      throw new Error('boom');
    });

    await expect(
      resolveLinkResult({ kind: 'vanity', username: 'ghost', url: 'https://facebook.com/ghost' }, lookup)
    ).rejects.toThrow('boom');
  });
});

describe('parseUidArgument', () => {
  it('should accept bare digits', async () => {
    await expect(parseUidArgument(' 12345 ')).resolves.toEqual({ uid: '12345', source: null });
  });

  it('should reject digit strings longer than twenty characters', async () => {
    await expect(parseUidArgument('123456789012345678901')).rejects.toThrow(
      '"123456789012345678901" is not a numeric Facebook UID'
    );
  });

  it('should read the uid of a link', async () => {
    await expect(parseUidArgument('m.facebook.com/profile.php?id=777')).resolves.toEqual({
      uid: '777',
      source: 'https://m.facebook.com/profile.php?id=777',
    });
  });

  it('should reject text that is not a link', async () => {
    await expect(parseUidArgument('abc')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should refuse vanity links without a lookup', async () => {
    await expect(parseUidArgument('https://facebook.com/jane.doe')).rejects.toThrow(
      'Link không chứa UID / The link has no numeric UID: https://facebook.com/jane.doe'
    );
  });

  it('should resolve vanity links through the lookup', async () => {
    const lookup = createLookup(async () => '100000000000002');

    await expect(parseUidArgument('https://facebook.com/jane.doe', lookup)).resolves.toEqual({
      uid: '100000000000002',
      source: 'https://facebook.com/jane.doe',
    });
  });

  it('should pass lookup failures through', async () => {
    const lookup = createLookup(async () => {
      throw new ExternalLookupError('timeout', true);
    });

    await expect(parseUidArgument('https://facebook.com/jane.doe', lookup)).rejects.toMatchObject({ transient: true });
  });

  it('should reject a non-numeric lookup result', async () => {
    const lookup = createLookup(async () => 'abc');

    await expect(parseUidArgument('https://facebook.com/jane.doe', lookup)).rejects.toBeInstanceOf(ExternalLookupError);
  });
});
