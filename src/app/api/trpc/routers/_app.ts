import { router } from '@/app/api/trpc/trpc';
import { archiveRouter } from '@/app/api/trpc/routers/archive';
import { childrenRouter } from '@/app/api/trpc/routers/children';
import { donationsRouter } from '@/app/api/trpc/routers/donations';
import { donorsRouter } from '@/app/api/trpc/routers/donors';
import { importsRouter } from '@/app/api/trpc/routers/imports';
import { projectsRouter } from '@/app/api/trpc/routers/projects';
import { sponsorshipsRouter } from '@/app/api/trpc/routers/sponsorships';

/**
 * Root router for the tRPC API
 * This combines all the sub-routers together
 */
export const appRouter = router({
  donations: donationsRouter,
  sponsorships: sponsorshipsRouter,
  donors: donorsRouter,
  children: childrenRouter,
  projects: projectsRouter,
  archive: archiveRouter,
  imports: importsRouter,
});

// Export type definition of API
export type AppRouter = typeof appRouter;
