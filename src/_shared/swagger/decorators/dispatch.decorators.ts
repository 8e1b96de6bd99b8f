import { applyDecorators } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for the catch-all dispatch endpoint
 */
export const ApiHookDispatch = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Run the hook bound to this path',
      description:
        'Any method, any configured path. The request body is piped to the program on stdin. The response carries a status code only; the program keeps running after it is sent.',
    }),
    ApiHeader({
      name: 'x-hub-signature',
      description:
        'HMAC-SHA1 of the raw body keyed with the hook secret, required when the hook has one',
      required: false,
      example: 'sha1=0123456789abcdef0123456789abcdef01234567',
    }),
    ApiResponse({ status: 200, description: 'Program started' }),
    ApiResponse({ status: 400, description: 'Malformed signature header' }),
    ApiResponse({ status: 401, description: 'Signature header missing' }),
    ApiResponse({ status: 404, description: 'No hook bound to this path' }),
    ApiResponse({ status: 406, description: 'Unsupported signature algorithm' }),
    ApiResponse({ status: 500, description: 'Program could not be started' }),
  );
};
