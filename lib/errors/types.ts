/**
 * Source of an API error: a JSON pointer into the request body, or the
 * offending query parameter.
 */
export type APIErrorSource = { pointer: string } | { parameter: string };

export type APIErrorLinks = {
  about?: string;
  associated?: {
    href: string;
    meta?: Record<string, unknown>;
  };
};

/**
 * A single entry of the `{ errors: [...] }` envelope
 */
export type APIErrorEntry = {
  id?: string;
  status: string;
  code: string;
  title: string;
  detail: string;
  source?: APIErrorSource;
  links?: APIErrorLinks;
  meta?: Record<string, unknown>;
};
