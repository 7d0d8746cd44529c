import { body, query, ValidationChain } from 'express-validator';
import { MOOD_DIMENSIONS } from '../types/mood.types';

export const recordMoodValidation: ValidationChain[] = [
    ...MOOD_DIMENSIONS.map((dimension) =>
        body(dimension)
            .exists({ values: 'null' })
            .withMessage(`${dimension} is required`)
            .bail()
            .isFloat({ min: 0, max: 1 })
            .withMessage(`${dimension} must be a number between 0 and 1`)
            .toFloat()
    ),

    body('note')
        .optional({ values: 'null' })
        .isString()
        .withMessage('Note must be a string')
        .bail()
        .trim()
        .isLength({ max: 255 })
        .withMessage('Note cannot exceed 255 characters')
];

export const statisticsValidation: ValidationChain[] = [
    query('days')
        .optional()
        .isInt({ min: 1, max: 30 })
        .withMessage('days must be an integer between 1 and 30')
        .toInt()
];
