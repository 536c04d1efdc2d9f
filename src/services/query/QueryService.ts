import { ActivityStore, DocumentStore } from '../../database';
import {
    ACTIVITY_SORT_FIELDS,
    ActivityMap,
    ActivitySortField,
    ActivityView,
    PARTICIPANT_SORT_FIELDS,
    ParticipantScore,
    ParticipantSortField
} from '../../types';
import { InvalidArgumentError } from '../../types/errors';
import { average, compareBy, SortKey } from '../../utils/sorting';

const isActivitySortField = (value: string): value is ActivitySortField =>
    ACTIVITY_SORT_FIELDS.some(field => field === value);

const isParticipantSortField = (value: string): value is ParticipantSortField =>
    PARTICIPANT_SORT_FIELDS.some(field => field === value);

/**
 * Read-only ranked views over activities and their rosters.
 */
export class QueryService {
    constructor(
        private readonly activities: ActivityStore,
        private readonly documents: DocumentStore
    ) {}

    public listActivities(): ActivityMap {
        return this.activities.list();
    }

    /**
     * Activities ordered by name, roster size or the mean score of their
     * verified documents (0 when none are verified).
     */
    public sortedActivities(sortBy: string, descending = false): ActivityView[] {
        if (!isActivitySortField(sortBy)) {
            throw new InvalidArgumentError(
                `Invalid sort_by. Must be one of: ${ACTIVITY_SORT_FIELDS.join(', ')}`,
                [{ field: 'sort_by', location: 'query', message: `Input should be ${ACTIVITY_SORT_FIELDS.map(f => `'${f}'`).join(', ')}` }]
            );
        }

        const views: ActivityView[] = Object.entries(this.activities.list())
            .map(([name, activity]) => ({ name, ...activity }));

        const averages = sortBy === 'score'
            ? new Map(views.map((view): [string, number] => [view.name, this.averageVerifiedScore(view.name)]))
            : new Map<string, number>();
        const keys: Record<ActivitySortField, (view: ActivityView) => SortKey> = {
            name: view => view.name,
            participants: view => view.participants.length,
            score: view => averages.get(view.name) ?? 0
        };

        return views.sort(compareBy(keys[sortBy], descending));
    }

    /**
     * Roster of one activity with each participant's first verified score.
     * Participants without one carry score null but sort as 0.
     */
    public sortedParticipants(activityName: string, sortBy: string, descending = false): ParticipantScore[] {
        const activity = this.activities.get(activityName);

        if (!isParticipantSortField(sortBy)) {
            throw new InvalidArgumentError(
                `Invalid sort_by. Must be one of: ${PARTICIPANT_SORT_FIELDS.join(', ')}`,
                [{ field: 'sort_by', location: 'query', message: `Input should be ${PARTICIPANT_SORT_FIELDS.map(f => `'${f}'`).join(', ')}` }]
            );
        }

        const documents = this.documents.list(activityName);
        const entries: ParticipantScore[] = activity.participants.map(email => ({
            email,
            score: documents.find(doc => doc.email === email && doc.verified)?.score ?? null
        }));

        const key: (entry: ParticipantScore) => SortKey = sortBy === 'name'
            ? entry => entry.email
            : entry => entry.score ?? 0;

        return entries.sort(compareBy(key, descending));
    }

    public averageVerifiedScore(activityName: string): number {
        const scores = this.documents.list(activityName)
            .filter(doc => doc.verified)
            .map(doc => doc.score);
        return average(scores);
    }
}
