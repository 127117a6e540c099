// services/storage/MongoNewsletterStore.ts
import mongoose from 'mongoose';
import Newsletter, { NewsletterRecord } from '../../models/newsletterModel';
import { PersistenceError } from '../../utils/pipelineErrors';
import { withPersistence } from './persistence';
import { INewsletterStore } from './IStores';
import { INewsletter } from '../../types';

type NewsletterLean = NewsletterRecord & { _id: mongoose.Types.ObjectId; __v?: number };

const toNewsletter = ({ _id, __v, ...rest }: NewsletterLean): INewsletter => ({ ...rest, _id: _id.toString() });

export class MongoNewsletterStore implements INewsletterStore {
    async findByDate(serverId: string, newsletterDate: string): Promise<INewsletter | null> {
        return withPersistence(`Loading newsletter ${serverId}/${newsletterDate}`, async () => {
            const doc = await Newsletter.findOne({ serverId, newsletterDate, status: { $ne: 'cancelled' } })
                .lean<NewsletterLean | null>();
            return doc ? toNewsletter(doc) : null;
        });
    }

    async save(newsletter: INewsletter): Promise<INewsletter> {
        const { _id, createdAt, updatedAt, ...data } = newsletter;

        return withPersistence(`Saving newsletter ${newsletter.serverId}/${newsletter.newsletterDate}`, async () => {
            if (!_id) {
                const created = await Newsletter.create(data);
                return toNewsletter(created.toObject<NewsletterLean>());
            }

            const doc = await Newsletter.findByIdAndUpdate(_id, data, { new: true, runValidators: true })
                .lean<NewsletterLean | null>();
            if (!doc) throw new PersistenceError(`Newsletter ${_id} no longer exists`);
            return toNewsletter(doc);
        });
    }

    async findStuck(olderThan: Date): Promise<INewsletter[]> {
        return withPersistence('Finding stuck newsletters', async () => {
            const docs = await Newsletter.find({
                status: { $in: ['generating', 'delivering'] },
                updatedAt: { $lt: olderThan }
            }).lean<NewsletterLean[]>();
            return docs.map(toNewsletter);
        });
    }

    async listByServer(serverId: string, limit: number): Promise<INewsletter[]> {
        return withPersistence(`Listing newsletters for ${serverId}`, async () => {
            const docs = await Newsletter.find({ serverId })
                .sort({ newsletterDate: -1, createdAt: -1 })
                .limit(limit)
                .lean<NewsletterLean[]>();
            return docs.map(toNewsletter);
        });
    }

    async findById(id: string): Promise<INewsletter | null> {
        if (!mongoose.isValidObjectId(id)) return null;
        return withPersistence(`Loading newsletter ${id}`, async () => {
            const doc = await Newsletter.findById(id).lean<NewsletterLean | null>();
            return doc ? toNewsletter(doc) : null;
        });
    }
}
