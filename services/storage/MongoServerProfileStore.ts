// services/storage/MongoServerProfileStore.ts
import ServerProfile from '../../models/serverProfileModel';
import { withPersistence } from './persistence';
import { IServerProfileStore } from './IStores';
import { IServerProfile } from '../../types';

export class MongoServerProfileStore implements IServerProfileStore {
    async getProfile(serverId: string): Promise<IServerProfile | null> {
        return withPersistence(`Loading profile ${serverId}`, () =>
            ServerProfile.findOne({ serverId }).lean<IServerProfile | null>()
        );
    }

    // Servers that should receive a scheduled newsletter
    async listActiveProfiles(): Promise<IServerProfile[]> {
        return withPersistence('Listing active profiles', () =>
            ServerProfile.find({ status: 'active', newsletterEnabled: true }).lean<IServerProfile[]>()
        );
    }
}
