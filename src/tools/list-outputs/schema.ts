/**
 * Schema definition for list-outputs tool
 */

import { z } from 'zod';

export const listOutputsSchema = z.object({
  only: z.array(z.string()).optional().describe('Restrict the listing to these resource ids'),
});

export type ListOutputsParams = z.infer<typeof listOutputsSchema>;
