import { Request, Response, NextFunction } from 'express';
import { HistoryService } from '../services/history/historyService';
import { INTERVIEW_STYLES } from '../models/types';
import { interviewConfig } from '../config/services';

export class HistoryController {
  constructor(private historyService: HistoryService) {}

  listHistory = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await this.historyService.listHistory();

      res.json({
        success: true,
        data: entries,
      });
    } catch (error) {
      console.error('[HistoryController] Failed to fetch interview history:', error);
      next(error);
    }
  };

  getOptions = (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        styles: INTERVIEW_STYLES,
        models: interviewConfig.models,
        defaultModel: interviewConfig.defaultModel,
        defaultQuestionCount: interviewConfig.defaultQuestionCount,
        minQuestions: interviewConfig.minQuestions,
        maxQuestions: interviewConfig.maxQuestions,
      },
    });
  };
}
