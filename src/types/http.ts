export interface HTTPErrorOptions {
  status: number;
  message: string;
  code?: string;
}

export interface ErrorResponseBody {
  message: string;
  code?: string;
}
