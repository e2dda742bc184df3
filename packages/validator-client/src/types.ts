/**
 * Options for ValidatorClient
 */
export interface ValidatorClientOptions {
  /**
   * URL of the validation endpoint, e.g. `http://kube-federated-auth:8080/validate`
   */
  validatorUrl: string;

  /**
   * Request timeout in milliseconds
   * @default 5000
   */
  timeoutMs?: number;
}

/**
 * Body of a validation request
 */
export interface ValidateRequestBody {
  cluster: string;
  token: string;
}
