import { ArgumentsHost, BadRequestException, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ConfigService } from '@nestjs/config';
import { EnvelopeExceptionFilter } from './envelope-exception.filter';
import { DatabaseError } from '../database/database.error';

function httpHost(status: jest.Mock, json: jest.Mock): ArgumentsHost {
    const response = { status: status.mockReturnValue({ json }) };
    const request = { method: 'GET', originalUrl: '/products/1' };
    return new ExecutionContextHost([request, response]);
}

describe('EnvelopeExceptionFilter', () => {
    const nodeEnv = process.env.NODE_ENV;
    let status: jest.Mock;
    let json: jest.Mock;

    beforeEach(() => {
        delete process.env.NODE_ENV;
        status = jest.fn();
        json = jest.fn();
    });

    afterEach(() => {
        process.env.NODE_ENV = nodeEnv;
    });

    const bodyOf = (mock: jest.Mock) => mock.mock.calls[0][0].body;

    it('keeps the status and message of HTTP exceptions', () => {
        new EnvelopeExceptionFilter(new ConfigService({})).catch(new NotFoundException('Product not found'), httpHost(status, json));

        expect(status).toHaveBeenCalledWith(404);
        expect(bodyOf(json)).toEqual({ code: '404', message: 'Product not found', data: null });
    });

    it('joins validation messages', () => {
        const error = new BadRequestException(['limit must not be less than 1', 'offset must be an integer number']);
        new EnvelopeExceptionFilter(new ConfigService({})).catch(error, httpHost(status, json));

        expect(bodyOf(json).message).toBe('limit must not be less than 1; offset must be an integer number');
    });

    it('describes database failures when details are exposed', () => {
        const error = new DatabaseError('timeout', 'cart_items', 'update');
        new EnvelopeExceptionFilter(new ConfigService({ EXPOSE_ERROR_DETAILS: 'true' })).catch(error, httpHost(status, json));

        expect(status).toHaveBeenCalledWith(500);
        expect(bodyOf(json)).toEqual({ code: '500', message: 'Database update on cart_items failed: timeout', data: null });
    });

    it('hides error text in production', () => {
        new EnvelopeExceptionFilter(new ConfigService({ NODE_ENV: 'production' })).catch(new Error('secret'), httpHost(status, json));

        expect(bodyOf(json).message).toBe('Internal server error');
    });
});
