import { interpretResponse } from "./interpret";
import { FetchTransport, type HttpMethod, type NetworkRequester, type RequestOptions } from "./transport";

export class PortalHttp {
  constructor(
    private readonly transport: FetchTransport,
    private readonly requester?: NetworkRequester
  ) {}

  request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<string> {
    if (this.requester) {
      return this.requester.request(method, url, interpretResponse, options);
    }
    return this.transport.request(method, url, options);
  }
}
