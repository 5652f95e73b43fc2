/**
 * Microsoft Graph client construction
 */

import { Client } from '@microsoft/microsoft-graph-client';

export type GraphClientFactory = (accessToken: string) => Client;

/**
 * Create Microsoft Graph client with access token
 */
export function createGraphClient(accessToken: string): Client {
  return Client.init({
    authProvider: (done) => {
      done(null, accessToken);
    },
    defaultVersion: 'v1.0',
  });
}
