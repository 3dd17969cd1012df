import type { Request, Response } from 'express';

export interface SuccessResponse<T> {
  success: true;
  code: number;
  message: string;
  data: T;
  timestamp: string;
  request_id?: string | string[];
}

/**
 * 统一成功响应
 */
export const sendSuccess = <T>(req: Request, res: Response, data: T, message: string = '获取成功', code: number = 200): void => {
  const body: SuccessResponse<T> = {
    success: true,
    code,
    message,
    data,
    timestamp: new Date().toISOString(),
    request_id: req.headers['x-request-id'],
  };
  res.status(code).json(body);
};
