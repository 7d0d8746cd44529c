import { body, ValidationChain } from 'express-validator';

const PASSWORD_MIN_LENGTH = 8;

export const registerValidation: ValidationChain[] = [
    body('email')
        .trim()
        .isEmail()
        .withMessage('Please provide a valid email')
        .normalizeEmail(),

    body('password')
        .isString()
        .withMessage('Password is required')
        .bail()
        .isLength({ min: PASSWORD_MIN_LENGTH })
        .withMessage(`Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
];

export const loginValidation: ValidationChain[] = [
    body('email')
        .trim()
        .isEmail()
        .withMessage('Please provide a valid email')
        .normalizeEmail(),

    body('password')
        .isString()
        .notEmpty()
        .withMessage('Password is required')
];

export const updateProfileValidation: ValidationChain[] = [
    body('email')
        .optional()
        .trim()
        .isEmail()
        .withMessage('Please provide a valid email')
        .normalizeEmail(),

    body('password')
        .optional()
        .isString()
        .isLength({ min: PASSWORD_MIN_LENGTH })
        .withMessage(`Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
];
