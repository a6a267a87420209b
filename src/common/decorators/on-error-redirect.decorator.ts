import { SetMetadata } from '@nestjs/common';

export const ON_ERROR_REDIRECT_KEY = 'onErrorRedirect';

/** Page a handler falls back to when it fails with a user-facing notice. */
export const OnErrorRedirect = (path: string) => SetMetadata(ON_ERROR_REDIRECT_KEY, path);
