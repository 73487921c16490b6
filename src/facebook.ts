import axios from 'axios';
import { load } from 'cheerio';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ExternalLookupError, toError } from './errors';
import type { HttpGetter } from './http';
import type { FacebookProfile, ProfileLookup } from './types';

const GRAPH_BASE = 'https://graph.facebook.com';
const WEB_BASE = 'https://www.facebook.com';

const graphIdSchema = z.object({
  id: z.string().regex(/^\d+$/),
});

const graphProfileSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  link: z.string().optional(),
  picture: z
    .object({
      data: z.object({ url: z.string().optional() }).optional(),
    })
    .optional(),
});

export type FacebookClientOptions = {
  accessToken?: string;
  graphVersion: string;
};

/**
 * Достаёт числовой id из HTML страницы профиля.
 * Facebook кладёт его в app-link мета-теги (fb://profile/<id>) или в JSON страницы
 */
export function parseProfileHtml(html: string): string | null {
  const $ = load(html);
  for (const property of ['al:android:url', 'al:ios:url']) {
    const content = $(`meta[property="${property}"]`).attr('content');
    const match = content?.match(/^fb:\/\/profile\/(\d+)/);
    if (match) return match[1];
  }
  const embedded = html.match(/"userID":"(\d+)"/);
  return embedded ? embedded[1] : null;
}

function isTransient(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return true;
  if (!error.response) return true;
  return error.response.status >= 500;
}

export class FacebookClient implements ProfileLookup {
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpGetter,
    private readonly options: FacebookClientOptions,
    logger: Logger
  ) {
    this.logger = logger.child({ module: 'facebook' });
  }

  async resolveUsername(username: string): Promise<string> {
    if (this.options.accessToken) {
      const data = await this.request(`resolve ${username}`, () =>
        this.http.get<unknown>(`${GRAPH_BASE}/${this.options.graphVersion}/${encodeURIComponent(username)}`, {
          params: { fields: 'id', access_token: this.options.accessToken },
        })
      );
      const parsed = graphIdSchema.safeParse(data);
      if (!parsed.success) {
        throw new ExternalLookupError(`Graph API returned no id for ${username}`, false);
      }
      return parsed.data.id;
    }

    const html = await this.request(`resolve ${username}`, () =>
      this.http.get<string>(`${WEB_BASE}/${encodeURIComponent(username)}`, { responseType: 'text' })
    );
    const uid = typeof html === 'string' ? parseProfileHtml(html) : null;
    if (!uid) {
      throw new ExternalLookupError(`No numeric id found on the profile page of ${username}`, false);
    }
    return uid;
  }

  async getProfile(uid: string): Promise<FacebookProfile> {
    if (!this.options.accessToken) {
      throw new ExternalLookupError('FB_ACCESS_TOKEN is not configured', false);
    }
    const data = await this.request(`profile ${uid}`, () =>
      this.http.get<unknown>(`${GRAPH_BASE}/${this.options.graphVersion}/${encodeURIComponent(uid)}`, {
        params: {
          fields: 'id,name,link,picture.width(800).height(800)',
          access_token: this.options.accessToken,
        },
      })
    );
    const parsed = graphProfileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalLookupError(`Unexpected Graph API response for ${uid}`, false);
    }
    return {
      id: parsed.data.id,
      name: parsed.data.name,
      link: parsed.data.link,
      pictureUrl: parsed.data.picture?.data?.url,
    };
  }

  pictureUrl(uid: string): string {
    return `${GRAPH_BASE}/${encodeURIComponent(uid)}/picture?type=large`;
  }

  private async request<T>(what: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const transient = isTransient(error);
      const cause = toError(error);
      this.logger.warn({ what, transient, error: cause.message }, 'Facebook request failed');
      throw new ExternalLookupError(`Facebook request failed (${what}): ${cause.message}`, transient, cause);
    }
  }
}
