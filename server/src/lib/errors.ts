export type SourceStatus =
  | 'ok'
  | 'missing_api_key'
  | 'upstream_error'
  | 'timeout'
  | 'bad_response'
  | 'degraded'
  | 'error';

/**
 * 외부 호출 실패 분류. 어댑터 경계에서 예외 대신 결과 객체에 실려 나간다.
 */
export type FailureKind =
  | 'config_error'
  | 'network_error'
  | 'http_error'
  | 'parse_error'
  | 'upstream_error';

export type Failure = {
  kind: FailureKind;
  message: string;
  status?: number;
  code?: string;
};

export class UpstreamError extends Error {
  code: SourceStatus;
  status?: number;
  constructor(msg: string, code: SourceStatus = 'upstream_error', status?: number) {
    super(msg);
    this.code = code;
    if (status !== undefined) {
      this.status = status;
    }
  }
}

export function describeFailure(failure: Failure): string {
  const parts: string[] = [failure.kind];
  if (failure.status != null) parts.push(String(failure.status));
  if (failure.code) parts.push(`code ${failure.code}`);
  return `${parts.join(' ')}: ${failure.message}`;
}

export function failureToStatus(kind: FailureKind): SourceStatus {
  switch (kind) {
    case 'config_error':
      return 'missing_api_key';
    case 'network_error':
      return 'timeout';
    case 'parse_error':
      return 'bad_response';
    case 'http_error':
    case 'upstream_error':
      return 'upstream_error';
  }
}
