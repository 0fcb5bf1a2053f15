import axios, { type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export const createJsonHttpClient = ({ baseUrl, timeoutMs }: HttpClientOptions): AxiosInstance =>
  axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
  });
