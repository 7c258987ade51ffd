// HTTP plumbing
export {
  HttpClient,
  ApiError,
  parseNextLink,
  type FetchFn,
  type HttpClientOptions,
} from "./http.js";

// GitHub
export {
  GitHubClient,
  DEFAULT_GITHUB_API_URL,
  type GitHubClientOptions,
} from "./github-client.js";

// Bitwarden
export {
  BitwardenClient,
  requestAccessToken,
  DEFAULT_BITWARDEN_API_URL,
  DEFAULT_BITWARDEN_IDENTITY_URL,
  type BitwardenClientOptions,
} from "./bitwarden-client.js";
