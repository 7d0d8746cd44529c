import { Router } from 'express';
import { MoodController } from '../controllers/mood.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { recordMoodValidation, statisticsValidation } from '../validators/mood.validators';

const router = Router();

router.post('/record', authMiddleware, recordMoodValidation, MoodController.recordMood);
router.get('/statistics', authMiddleware, statisticsValidation, MoodController.getStatistics);
router.get('/current', authMiddleware, MoodController.getCurrentMood);

export default router;
