import { Router } from 'express';
import { RecommendationController } from '../controllers/recommendation.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import {
  analyzeRecentTracksValidation,
  getRecommendationsValidation,
  queueTrackValidation
} from '../validators/recommendation.validators';

const router = Router();

router.get(
  '/analyze-recent-tracks',
  authMiddleware,
  analyzeRecentTracksValidation,
  RecommendationController.analyzeRecentTracks
);
router.get(
  '/get-recommendations',
  authMiddleware,
  getRecommendationsValidation,
  RecommendationController.getRecommendations
);
router.post('/queue-song', authMiddleware, queueTrackValidation, RecommendationController.queueSong);

export default router;
