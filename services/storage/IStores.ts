import { IMessage, INewsletter, IServerProfile } from '../../types';

export interface IMessageFeed {
    getMessages(serverId: string, since: Date, until: Date): Promise<IMessage[]>;
}

export interface IServerProfileStore {
    getProfile(serverId: string): Promise<IServerProfile | null>;
    listActiveProfiles(): Promise<IServerProfile[]>;
}

export interface INewsletterStore {
    /** The live (non-cancelled) newsletter of a server for a date, if any. */
    findByDate(serverId: string, newsletterDate: string): Promise<INewsletter | null>;
    /** Inserts when `_id` is absent, replaces otherwise. Returns the stored record. */
    save(newsletter: INewsletter): Promise<INewsletter>;
    /** GENERATING or DELIVERING records untouched since `olderThan`. */
    findStuck(olderThan: Date): Promise<INewsletter[]>;
    listByServer(serverId: string, limit: number): Promise<INewsletter[]>;
    findById(id: string): Promise<INewsletter | null>;
}
