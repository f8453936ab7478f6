import axios from 'axios';
import * as https from 'https';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../crawl/types';

const insecureAgent = new https.Agent({ rejectUnauthorized: false });

export class AxiosHttpClient implements HttpClient {
  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const response = await axios.get<string>(url, {
      headers: {
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        ...options.headers,
      },
      timeout: options.timeoutMs,
      responseType: 'text',
      httpsAgent: options.verifyTls ? undefined : insecureAgent,
      validateStatus: () => true,
    });

    return { status: response.status, body: String(response.data) };
  }
}
