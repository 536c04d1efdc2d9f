import { ActivityStore } from '../../database';
import { MessageResponse } from '../../types';
import { NotFoundError } from '../../types/errors';
import { logger } from '../../utils/logger';

export class EnrollmentService {
    constructor(private readonly activities: ActivityStore) {}

    /**
     * Appends the email to the activity roster.
     * max_participants is informational only and is not checked here.
     */
    public signup(activityName: string, email: string): MessageResponse {
        this.requireActivity(activityName);
        this.activities.addParticipant(activityName, email);

        logger.info(`[Enrollment] ${email} signed up for ${activityName}`);
        return { message: `Signed up ${email} for ${activityName}` };
    }

    public unregister(activityName: string, email: string): MessageResponse {
        this.requireActivity(activityName);
        this.activities.removeParticipant(activityName, email);

        logger.info(`[Enrollment] ${email} unregistered from ${activityName}`);
        return { message: `Unregistered ${email} from ${activityName}` };
    }

    private requireActivity(activityName: string): void {
        if (!this.activities.exists(activityName)) {
            throw new NotFoundError('Activity not found');
        }
    }
}
