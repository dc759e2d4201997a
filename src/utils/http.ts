import axios, { type AxiosRequestConfig, type AxiosResponse } from "axios";

/**
 * Single GET through axios. Every status resolves (`validateStatus`), so callers
 * branch on `response.status`; only transport failures reject.
 */
export function httpGet<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
  return axios.request<T>({ ...config, method: "GET", validateStatus: () => true });
}
