import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';

// Adds `.openapi()` to every zod schema; import `z` from here
extendZodWithOpenApi(z);

export { z };
