/**
 * Team Routes
 */

import { Router } from 'express';
import type { TeamController } from '../controllers/team.controller';

export function createTeamRoutes(teamController: TeamController): Router {
  const router = Router();

  // POST /api/invite - Create a single-use invite code
  router.post('/invite', teamController.createInvite);

  // GET /api/team - Members and pending invites
  router.get('/team', teamController.listTeam);

  router.delete('/team/:userId', teamController.removeMember);
  router.post('/team/:userId/reset-password', teamController.resetPassword);

  return router;
}
