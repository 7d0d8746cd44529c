import { Router } from 'express';
import { UserController } from '../controllers/user.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { updateProfileValidation } from '../validators/auth.validators';

const router = Router();

router.get('/me', authMiddleware, UserController.getCurrentProfile);
router.put('/me', authMiddleware, updateProfileValidation, UserController.updateProfile);

export default router;
