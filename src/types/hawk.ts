export type HawkField = "id" | "ts" | "nonce" | "mac" | "ext" | "hash" | "app" | "dlg";

export interface HawkHeader {
  id?: string;
  ts?: number;
  nonce?: string;
  mac?: string;
  ext?: string;
  hash?: string;
  app?: string;
  dlg?: string;
}

export type HawkHeaderName = "authorization" | "server-authorization";
