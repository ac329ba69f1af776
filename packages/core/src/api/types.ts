export type RequestInitWithSignal = RequestInit & { signal?: AbortSignal };
