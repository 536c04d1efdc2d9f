import { Activity, ActivityMap } from '../../types';
import { ConflictError, NotFoundError } from '../../types/errors';

const cloneActivity = (activity: Activity): Activity => ({
    ...activity,
    participants: [...activity.participants]
});

/**
 * Activity records keyed by their exact, case-sensitive name.
 * Every read hands out a copy, so callers never hold a reference into the store.
 */
export class ActivityStore {
    private readonly activities = new Map<string, Activity>();

    constructor(seed: ActivityMap) {
        for (const [name, activity] of Object.entries(seed)) {
            this.activities.set(name, cloneActivity(activity));
        }
    }

    public list(): ActivityMap {
        const snapshot: ActivityMap = {};
        for (const [name, activity] of this.activities) {
            snapshot[name] = cloneActivity(activity);
        }
        return snapshot;
    }

    public exists(name: string): boolean {
        return this.activities.has(name);
    }

    public get(name: string): Activity {
        return cloneActivity(this.require(name));
    }

    public addParticipant(name: string, email: string): Activity {
        const activity = this.require(name);
        if (activity.participants.includes(email)) {
            throw new ConflictError('Student is already signed up');
        }

        activity.participants.push(email);
        return cloneActivity(activity);
    }

    public removeParticipant(name: string, email: string): Activity {
        const activity = this.require(name);
        const index = activity.participants.indexOf(email);
        if (index === -1) {
            throw new ConflictError('Student is not signed up for this activity');
        }

        activity.participants.splice(index, 1);
        return cloneActivity(activity);
    }

    private require(name: string): Activity {
        const activity = this.activities.get(name);
        if (!activity) {
            throw new NotFoundError('Activity not found');
        }
        return activity;
    }
}
