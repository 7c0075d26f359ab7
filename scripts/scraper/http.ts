import axios, { type AxiosInstance } from 'axios';
import type { HttpClient, HttpResponse } from './types';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const isOk = (status: number) => status >= 200 && status < 300;

export class AxiosHttpClient implements HttpClient {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'fi-FI,fi;q=0.9,en-US;q=0.8,en;q=0.7',
        },
      });
  }

  async get(url: string): Promise<HttpResponse> {
    const res = await this.client.get<string>(url, {
      responseType: 'text',
      validateStatus: () => true,
    });
    return { status: res.status, body: res.data };
  }
}
