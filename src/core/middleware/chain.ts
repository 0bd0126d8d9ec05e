type THandler<TContext> = (ctx: TContext) => Promise<void>
type TInterceptor<TContext> = (next: THandler<TContext>) => THandler<TContext>

/**
 * Composes `[m1, m2, m3]` around `terminal` as `m1(m2(m3(terminal)))`.
 * The first interceptor is outermost: it sees the context first and the outcome last.
 */
export function buildChain<TContext>(
  interceptors: readonly TInterceptor<TContext>[],
  terminal: THandler<TContext>,
): THandler<TContext> {
  return interceptors.reduceRight<THandler<TContext>>(
    (next, interceptor) => interceptor(next),
    terminal,
  )
}

export async function passThrough(): Promise<void> {}
