import { ExternalLookupError, ValidationError } from './errors';
import type { ProfileLookup } from './types';

export type FacebookLink =
  | { kind: 'numeric'; uid: string; url: string }
  | { kind: 'vanity'; username: string; url: string };

// facebook.com / fb.com с любым поддоменом (www, m, mbasic, web, vi-vn), схема необязательна
const FACEBOOK_URL_RE = /(?<![\w.-])(?:https?:\/\/)?(?:[a-z0-9-]+\.)?(?:facebook\.com|fb\.com)\/[^\s<>"']+/gi;

const TRAILING_PUNCTUATION_RE = /[)\].,!?;:]+$/;

const DIGITS_RE = /^\d{1,20}$/;
const USERNAME_RE = /^[0-9A-Za-z.\-_]+$/;

// Служебные пути Facebook, которые не являются именем профиля
const RESERVED_PATHS = new Set([
  'groups', 'pages', 'events', 'watch', 'share', 'sharer', 'sharer.php', 'login', 'login.php',
  'home.php', 'marketplace', 'gaming', 'help', 'policies', 'privacy', 'settings', 'notifications',
  'messages', 'friends', 'photo.php', 'photo', 'photos', 'video.php', 'videos', 'reel', 'reels',
  'stories', 'hashtag', 'search', 'dialog', 'plugins', 'l.php', 'tr', 'ads', 'business', 'legal',
]);

function normalizeUrl(raw: string): URL | null {
  const trimmed = raw.replace(TRAILING_PUNCTUATION_RE, '');
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const url = new URL(withScheme);
    const host = url.hostname.toLowerCase();
    const isFacebook =
      host === 'facebook.com' || host.endsWith('.facebook.com') || host === 'fb.com' || host.endsWith('.fb.com');
    return isFacebook ? url : null;
  } catch {
    return null;
  }
}

function digitsOrNull(value: string | null | undefined): string | null {
  return value && DIGITS_RE.test(value) ? value : null;
}

/**
 * Разбирает одну ссылку на Facebook. null, если ссылка не ведёт на профиль
 */
export function parseFacebookLink(raw: string): FacebookLink | null {
  const url = normalizeUrl(raw);
  if (!url) return null;

  const href = url.toString();
  const segments = url.pathname.split('/').filter(Boolean);
  const [first, second, third, fourth] = segments;
  if (!first) return null;

  const numeric = (uid: string | null): FacebookLink | null => (uid ? { kind: 'numeric', uid, url: href } : null);

  switch (first.toLowerCase()) {
    case 'profile.php':
    case 'permalink.php':
    case 'story.php':
      return numeric(digitsOrNull(url.searchParams.get('id')));
    case 'people':
      return numeric(digitsOrNull(third));
    case 'groups':
      return second && third === 'user' ? numeric(digitsOrNull(fourth)) : null;
  }

  if (DIGITS_RE.test(first)) {
    return numeric(first);
  }

  if (RESERVED_PATHS.has(first.toLowerCase()) || !USERNAME_RE.test(first)) {
    return null;
  }

  return { kind: 'vanity', username: first, url: href };
}

export function findFacebookLinks(text: string): FacebookLink[] {
  const links: FacebookLink[] = [];
  const seen = new Set<string>();
  for (const match of text.matchAll(FACEBOOK_URL_RE)) {
    const link = parseFacebookLink(match[0]);
    if (!link) continue;
    const key = link.kind === 'numeric' ? `uid:${link.uid}` : `name:${link.username.toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    links.push(link);
  }
  return links;
}

/**
 * Первый UID, закодированный прямо в ссылке. Никогда не бросает
 */
export function extract(text: string): string | null {
  for (const link of findFacebookLinks(text)) {
    if (link.kind === 'numeric') return link.uid;
  }
  return null;
}

/**
 * Как extract, но ссылки с именем профиля резолвятся через lookup.
 * Неудачный поиск пропускает ссылку, промис не отклоняется
 */
export async function resolve(text: string, lookup?: ProfileLookup): Promise<string | null> {
  for (const link of findFacebookLinks(text)) {
    const uid = await resolveLink(link, lookup);
    if (uid) return uid;
  }
  return null;
}

export type LinkResolution = { ok: true; uid: string } | { ok: false; transient: boolean };

/**
 * Резолвит одну ссылку. Ошибки поиска становятся { ok: false },
 * всё, что не ExternalLookupError, пробрасывается
 */
export async function resolveLinkResult(link: FacebookLink, lookup?: ProfileLookup): Promise<LinkResolution> {
  if (link.kind === 'numeric') return { ok: true, uid: link.uid };
  if (!lookup) return { ok: false, transient: false };
  try {
    const uid = await lookup.resolveUsername(link.username);
    return DIGITS_RE.test(uid) ? { ok: true, uid } : { ok: false, transient: false };
  } catch (error) {
    if (!(error instanceof ExternalLookupError)) throw error;
    return { ok: false, transient: error.transient };
  }
}

export async function resolveLink(link: FacebookLink, lookup?: ProfileLookup): Promise<string | null> {
  try {
    const result = await resolveLinkResult(link, lookup);
    return result.ok ? result.uid : null;
  } catch {
    return null;
  }
}

export type UidArgument = {
  uid: string;
  source: string | null;
};

/**
 * Аргумент команды: UID цифрами или ссылка.
 * Без lookup ссылка с именем профиля не принимается; ошибки lookup пробрасываются
 */
export async function parseUidArgument(arg: string, lookup?: ProfileLookup): Promise<UidArgument> {
  const trimmed = arg.trim();
  if (/^\d+$/.test(trimmed)) {
    if (!DIGITS_RE.test(trimmed)) {
      throw new ValidationError(`"${trimmed}" is not a numeric Facebook UID`);
    }
    return { uid: trimmed, source: null };
  }

  const [link] = findFacebookLinks(trimmed);
  if (!link) {
    throw new ValidationError(`"${trimmed}" không phải UID hoặc link Facebook / is not a UID or a Facebook link`);
  }
  if (link.kind === 'numeric') {
    return { uid: link.uid, source: link.url };
  }
  if (!lookup) {
    throw new ValidationError(`Link không chứa UID / The link has no numeric UID: ${link.url}`);
  }

  const uid = await lookup.resolveUsername(link.username);
  if (!DIGITS_RE.test(uid)) {
    throw new ExternalLookupError(`No numeric id for ${link.username}`, false);
  }
  return { uid, source: link.url };
}
