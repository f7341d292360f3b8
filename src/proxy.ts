/**
 * Configures a SOCKS proxy on the global axios instance.
 * Must run before any CLOB client usage: clob-client uses the default
 * axios instance for its HTTP calls.
 */
import axios from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';

export function redactProxyUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

export function configureProxy(proxyUrl: string): boolean {
  if (!proxyUrl) {
    console.log('⚠️  No PROXY_URL set — order traffic goes out directly');
    return false;
  }

  const agent = new SocksProxyAgent(proxyUrl);

  axios.defaults.httpsAgent = agent;
  axios.defaults.httpAgent  = agent;
  // The agent does the proxying; axios's own proxy handling must be off.
  axios.defaults.proxy = false;

  console.log(`🌐 Proxy configured: ${redactProxyUrl(proxyUrl)}`);
  return true;
}
