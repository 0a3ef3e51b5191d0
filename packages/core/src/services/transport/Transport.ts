import type { HeaderMap, PreparedRequest } from "@reqdeck/shared";

export interface TransportResponse {
  status: number;
  reasonPhrase: string;
  headers: HeaderMap;
  rawBody: string;
  byteLength: number;
}

/** Sends one prepared request. Failures surface as `transport_error`. */
export interface Transport {
  send(request: PreparedRequest): Promise<TransportResponse>;
}
