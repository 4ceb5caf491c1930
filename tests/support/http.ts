import express, { Request, Response } from 'express';
import { IncomingHttpHeaders } from 'http';
import '../../src/types/express';
import { AuthenticatedUser } from '../../src/models/request.model';

type RequestInit = {
    body?: unknown;
    params?: Record<string, string>;
    query?: Record<string, string>;
    headers?: IncomingHttpHeaders;
    user?: AuthenticatedUser;
};

export const buildRequest = (init: RequestInit = {}): Request => {
    const req: Request = Object.create(express.request);
    req.body = init.body ?? {};
    req.params = init.params ?? {};
    req.query = init.query ?? {};
    req.headers = init.headers ?? {};
    req.user = init.user;
    return req;
};

export type RecordedResponse = {
    res: Response;
    sent: () => { status: number; body: unknown; contentType: string | undefined };
};

// Records status and payload without going through Express' send pipeline
export const recordResponse = (): RecordedResponse => {
    const res: Response = Object.create(express.response);
    let status = 200;
    let body: unknown;
    let contentType: string | undefined;

    res.status = (code: number) => {
        status = code;
        return res;
    };
    res.json = (payload?: unknown) => {
        body = payload;
        contentType = 'json';
        return res;
    };
    res.type = (value: string) => {
        contentType = value;
        return res;
    };
    res.send = (payload?: unknown) => {
        body = payload;
        return res;
    };

    return { res, sent: () => ({ status, body, contentType }) };
};
