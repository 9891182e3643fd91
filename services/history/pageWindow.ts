import { CONSTANTS } from '../../utils/constants';
import { InvalidInputError } from '../../utils/AppError';

// Shared bounds check for list(limit, offset)
export const assertPageWindow = (limit: number, offset: number): void => {
    if (!Number.isInteger(limit) || limit < 1 || limit > CONSTANTS.HISTORY.MAX_LIMIT) {
        throw new InvalidInputError(`limit must be an integer between 1 and ${CONSTANTS.HISTORY.MAX_LIMIT}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
        throw new InvalidInputError('offset must be a non-negative integer');
    }
};
