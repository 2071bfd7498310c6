/**
 * Injectable runtime seams for HTTP clients.
 * Tests pass fakes; production uses the defaults below.
 */

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;

export const defaultFetch: FetchFn = (input, init) => fetch(input, init);

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export const systemClock: Clock = () => Date.now();

/**
 * Read a response body as text, then parse it as JSON when possible
 */
export async function readBody(response: Response): Promise<{ text: string; json: unknown }> {
  const text = await response.text();
  if (!text) {
    return { text, json: undefined };
  }
  try {
    const json: unknown = JSON.parse(text);
    return { text, json };
  } catch {
    return { text, json: undefined };
  }
}
