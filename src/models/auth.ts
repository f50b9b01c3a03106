/** OAuth 1.0a token pair for a Flickr user. */
export interface FlickrAuthData {
  kind: "oauth1";
  token: string;
  tokenSecret: string;
}

/** OAuth 2.0 tokens plus the server that refreshes them. */
export interface TokensAndUrlAuthData {
  kind: "oauth2";
  accessToken: string;
  refreshToken?: string;
  tokenServerUrl: string;
}

export type AuthData = FlickrAuthData | TokensAndUrlAuthData;
