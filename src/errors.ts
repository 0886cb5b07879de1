export class RedditApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'RedditApiError';
  }
}

export class RedditAuthError extends RedditApiError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = 'RedditAuthError';
  }
}

export class RedditNotFoundError extends RedditApiError {
  constructor(readonly username: string) {
    super(`Reddit user u/${username} was not found or is suspended.`, 404);
    this.name = 'RedditNotFoundError';
  }
}
