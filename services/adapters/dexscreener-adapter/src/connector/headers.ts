/**
 * 浏览器风格的连接请求头
 * User-Agent 在每次连接尝试时轮换
 */

import userAgents from './user-agents.json';

export const UPSTREAM_ORIGIN = 'https://dexscreener.com';

export const USER_AGENTS: readonly string[] = userAgents;

/**
 * 构造第 rotation 次连接尝试使用的请求头
 */
export function buildBrowserHeaders(rotation: number): Record<string, string> {
  const index = ((rotation % USER_AGENTS.length) + USER_AGENTS.length) % USER_AGENTS.length;

  return {
    'User-Agent': USER_AGENTS[index],
    'Accept': '*/*',
    'Accept-Language': 'en-GB,en;q=0.5',
    'Accept-Encoding': 'gzip, deflate, br, zstd',
    'Origin': UPSTREAM_ORIGIN,
    'Sec-Fetch-Dest': 'empty',
    'Sec-Fetch-Mode': 'websocket',
    'Sec-Fetch-Site': 'same-site',
    'Pragma': 'no-cache',
    'Cache-Control': 'no-cache'
  };
}
