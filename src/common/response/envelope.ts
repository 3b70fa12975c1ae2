import { HttpStatus } from '@nestjs/common';

export const SERVER_TAG = 'NestJS';
export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export interface EnvelopeHeader {
  'content-type': string;
  server: string;
  date: string;
}

export interface EnvelopeBody<T> {
  code: string;
  message: string;
  data: T;
}

/** Uniform wrapper for every response; `body.code` always mirrors the HTTP status. */
export interface ResponseEnvelope<T> {
  header: EnvelopeHeader;
  body: EnvelopeBody<T>;
}

export function createEnvelope<T>(
  data: T,
  message = 'Success',
  status: number = HttpStatus.OK,
  now: Date = new Date(),
): ResponseEnvelope<T> {
  return {
    header: {
      'content-type': JSON_CONTENT_TYPE,
      server: SERVER_TAG,
      date: now.toISOString(),
    },
    body: {
      code: String(status),
      message,
      data,
    },
  };
}
