import axios from 'axios';
import type {
  DashboardParams,
  DashboardResult,
  ParameterDefinitions,
  PositionSizeResult,
  ProjectionMode,
  SizingParams,
} from './types';

const API_BASE = '/api';

export async function fetchParameters(): Promise<ParameterDefinitions> {
  const response = await axios.get<ParameterDefinitions>(`${API_BASE}/parameters`);
  return response.data;
}

export async function fetchDashboard(
  params: DashboardParams,
  projectionMode: ProjectionMode,
  signal?: AbortSignal,
): Promise<DashboardResult> {
  const response = await axios.post<DashboardResult>(
    `${API_BASE}/dashboard`,
    { ...params, projectionMode },
    { signal },
  );
  return response.data;
}

export async function fetchPositionSize(params: SizingParams, signal?: AbortSignal): Promise<PositionSizeResult> {
  const response = await axios.post<PositionSizeResult>(`${API_BASE}/sizing`, params, { signal });
  return response.data;
}

/**
 * The server's message for a failed request (validation failures carry a
 * list), or `fallback` when there is none.
 */
export function describeError(error: unknown, fallback: string): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (data && typeof data === 'object' && 'message' in data) {
      const { message } = data;
      if (Array.isArray(message)) return message.join(', ');
      if (typeof message === 'string') return message;
    }
    return error.message || fallback;
  }
  return error instanceof Error ? error.message : fallback;
}

export function isCancelled(error: unknown): boolean {
  return axios.isCancel(error);
}
