/**
 * Port for fetching JSON documents over HTTP GET.
 *
 * Implementations throw FetchError for non-2xx responses, transport
 * failures and bodies that are not JSON.
 */
export abstract class JsonHttpClient {
  abstract getJson(url: string): Promise<unknown>;
}
