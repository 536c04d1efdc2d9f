export interface FieldIssue {
    field: string;
    location: 'query' | 'path' | 'form';
    message: string;
}
