import { errorMessage } from './errors.js';
import type { PreviewTestResult } from './types.js';

export type HttpProbe = (url: string, timeoutMs: number) => Promise<PreviewTestResult>;

/**
 * GET the preview URL once; any response counts, only transport failures
 * and timeouts become an error.
 */
export const fetchProbe: HttpProbe = async (url, timeoutMs) => {
  try {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs),
    });
    await response.body?.cancel();
    return { statusCode: response.status };
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      return { error: `Timed out after ${timeoutMs}ms` };
    }
    return { error: errorMessage(err) };
  }
};
