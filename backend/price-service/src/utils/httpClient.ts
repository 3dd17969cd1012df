import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { getLogger } from '@/utils/logger';

const logger = getLogger('http');

interface TimedRequestConfig extends InternalAxiosRequestConfig {
  metadata?: { startedAt: number };
}

// 创建axios实例
export const createApiClient = (baseURL: string, serviceName: string, timeout: number = 10000): AxiosInstance => {
  const client = axios.create({
    baseURL,
    timeout,
    headers: {
      Accept: 'application/json',
    },
  });

  // 请求拦截器 - 记录开始时间
  client.interceptors.request.use((requestConfig: TimedRequestConfig) => {
    requestConfig.metadata = { startedAt: Date.now() };
    logger.debug(`[${serviceName}] ${requestConfig.method?.toUpperCase()} ${requestConfig.url}`);
    return requestConfig;
  });

  // 响应拦截器 - 记录耗时与错误
  client.interceptors.response.use(
    (response: AxiosResponse) => {
      const requestConfig: TimedRequestConfig = response.config;
      const startedAt = requestConfig.metadata?.startedAt;
      if (startedAt !== undefined) {
        logger.debug(`[${serviceName}] ${response.status} ${response.config.url} (${Date.now() - startedAt}ms)`);
      }
      return response;
    },
    (error: AxiosError) => {
      logger.warn(`[${serviceName}] request failed`, {
        url: error.config?.url,
        status: error.response?.status,
        code: error.code,
        message: error.message,
      });
      return Promise.reject(error);
    }
  );

  return client;
};
