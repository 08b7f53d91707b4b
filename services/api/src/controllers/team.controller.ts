/**
 * Team controller
 * Members, invites and admin password resets
 */

import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { requireIdentity } from '../middleware/auth.middleware';
import type { TeamService } from '../services/team/team.service';
import { requestedCompanyId } from './request-params';

export class TeamController {
  constructor(private teamService: TeamService) {}

  listTeam = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const team = await this.teamService.listTeam(requireIdentity(req), requestedCompanyId(req));
      res.json(team);
    } catch (error) {
      next(error);
    }
  };

  createInvite = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const invite = await this.teamService.createInvite(requireIdentity(req), req.body);
      res.status(StatusCodes.CREATED).json({ success: true, code: invite.code, invite });
    } catch (error) {
      next(error);
    }
  };

  removeMember = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.teamService.removeMember(requireIdentity(req), req.params.userId);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  };

  resetPassword = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.teamService.resetPassword(requireIdentity(req), req.params.userId, req.body);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  };
}
