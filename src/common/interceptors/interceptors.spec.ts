import { RequestTimeoutException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { firstValueFrom, NEVER, of, throwError } from 'rxjs';
import { TimeoutInterceptor } from './timeout.interceptor';
import { TransformInterceptor } from './transform.interceptor';

const context = () => new ExecutionContextHost([{ headers: { 'x-request-id': 'req-7' } }, {}]);

describe('TransformInterceptor', () => {
  it('wraps the handler result', async () => {
    const interceptor = new TransformInterceptor<number[]>();

    const result = await firstValueFrom(interceptor.intercept(context(), { handle: () => of([1, 2]) }));

    expect(result).toEqual({ success: true, data: [1, 2], requestId: 'req-7', timestamp: expect.any(String) });
  });
});

describe('TimeoutInterceptor', () => {
  it('passes results through in time', async () => {
    const interceptor = new TimeoutInterceptor(1000);

    await expect(firstValueFrom(interceptor.intercept(context(), { handle: () => of('ok') }))).resolves.toBe('ok');
  });

  it('turns a slow handler into a request timeout', async () => {
    const interceptor = new TimeoutInterceptor(5);

    await expect(firstValueFrom(interceptor.intercept(context(), { handle: () => NEVER }))).rejects.toBeInstanceOf(
      RequestTimeoutException,
    );
  });

  it('rethrows other errors untouched', async () => {
    const interceptor = new TimeoutInterceptor(1000);
    const failure = new Error('feed down');

    await expect(
      firstValueFrom(interceptor.intercept(context(), { handle: () => throwError(() => failure) })),
    ).rejects.toBe(failure);
  });
});
