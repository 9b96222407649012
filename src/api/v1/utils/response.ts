import { Response } from 'express';

export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  statusCode: number;
  data: T | Record<string, never>;
}

export const sendResponse = <T = unknown>(
  res: Response,
  statusCode: number,
  message: string,
  data?: T
): void => {
  const success = statusCode >= 200 && statusCode < 300;

  const body: ApiResponse<T> = {
    success,
    message,
    statusCode,
    data: data ?? {}
  };
  res.status(statusCode).json(body);
};
