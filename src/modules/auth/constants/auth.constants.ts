export const AUTH_ERRORS = {
  INCORRECT_LOGIN: 'Incorrect username or password',
  INVALID_CREDENTIALS: 'Could not validate credentials',
};

export const BEARER_TOKEN_TYPE = 'bearer';
