import { Request, Response } from 'express';
import { QueryService } from '../../../services/query/QueryService';
import { ACTIVITY_SORT_FIELDS, PARTICIPANT_SORT_FIELDS } from '../../../types';
import { parseBoolean, parseChoice } from '../../validation/params';

/**
 * Read endpoints: the raw activity map and the two ranked views
 */
export class ActivityController {
    constructor(private readonly queryService: QueryService) {}

    public getActivities = (_req: Request, res: Response): void => {
        res.json(this.queryService.listActivities());
    };

    public getSortedActivities = (req: Request, res: Response): void => {
        const sortBy = parseChoice(req.query.sort_by, 'sort_by', 'query', ACTIVITY_SORT_FIELDS, 'name');
        const descending = parseBoolean(req.query.descending, 'descending', 'query', false);

        res.json(this.queryService.sortedActivities(sortBy, descending));
    };

    public getSortedParticipants = (req: Request, res: Response): void => {
        const sortBy = parseChoice(req.query.sort_by, 'sort_by', 'query', PARTICIPANT_SORT_FIELDS, 'name');
        const descending = parseBoolean(req.query.descending, 'descending', 'query', false);

        res.json(this.queryService.sortedParticipants(req.params.name, sortBy, descending));
    };
}
