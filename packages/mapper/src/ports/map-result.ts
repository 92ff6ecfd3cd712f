import type { AppError } from "@rowmap/errors"

export type MapOk<V> = {
  readonly kind: "ok"
  readonly value: V
}

/** The stored row had no data */
export type MapEmpty = {
  readonly kind: "empty"
}

export type MapFailed = {
  readonly kind: "failed"
  readonly error: AppError
}

export type WriteResult<V> = MapOk<V> | MapFailed

export type ReadResult<T> = MapOk<T> | MapEmpty | MapFailed
