import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

export type HttpClientOptions = {
  timeoutMs: number;
  userAgent?: string;
};

export interface HttpGetter {
  get<T = unknown>(url: string, options?: AxiosRequestConfig): Promise<T>;
}

/**
 * Одна попытка на запрос: повторов нет, таймаут задаёт axios
 */
export class HttpClient implements HttpGetter {
  private client: AxiosInstance;

  constructor(options: HttpClientOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      headers: {
        'User-Agent': options.userAgent ?? 'Mozilla/5.0 (compatible; fb-uid-bot/1.0)',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
  }

  async get<T = unknown>(url: string, options?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, options);
    return response.data;
  }
}
