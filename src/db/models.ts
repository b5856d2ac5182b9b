import { DataTypes, Model, NonAttribute, Optional, Sequelize } from 'sequelize';

interface InternalPostAttributes {
  id: string;
  userId: string;
  content: string;
  mediaUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

interface InternalPostCreationAttributes
  extends Optional<InternalPostAttributes, 'mediaUrl' | 'createdAt' | 'updatedAt'> {}

interface InternalPostMappingAttributes {
  id: number;
  userId: string;
  postId: string;
  comments: string | null;
  liked: boolean;
  disliked: boolean;
  createdAt: Date;
  updatedAt: Date;
}

interface InternalPostMappingCreationAttributes
  extends Optional<InternalPostMappingAttributes, 'id' | 'comments' | 'liked' | 'disliked' | 'createdAt' | 'updatedAt'> {}

export const POSTS_TABLE = 'userposts';
export const POST_MAPPINGS_TABLE = 'userpostsmapping';
export const MAPPINGS_ALIAS = 'mappings';

export class PostModel extends Model<InternalPostAttributes, InternalPostCreationAttributes> implements InternalPostAttributes {
  declare id: string;
  declare userId: string;
  declare content: string;
  declare mediaUrl: string | null;
  declare createdAt: Date;
  declare updatedAt: Date;

  declare mappings?: NonAttribute<PostMappingModel[]>;
}

export class PostMappingModel
  extends Model<InternalPostMappingAttributes, InternalPostMappingCreationAttributes>
  implements InternalPostMappingAttributes {
  declare id: number;
  declare userId: string;
  declare postId: string;
  declare comments: string | null;
  declare liked: boolean;
  declare disliked: boolean;
  declare createdAt: Date;
  declare updatedAt: Date;
}

export interface PostModels {
  Post: typeof PostModel;
  PostMapping: typeof PostMappingModel;
}

/**
 * Binds both models to the given connection. Model classes carry their
 * Sequelize instance, so only one database handle per process is supported.
 */
export const initPostModels = (sequelize: Sequelize): PostModels => {
  PostModel.init(
    {
      id: {
        type: DataTypes.TEXT,
        primaryKey: true,
        allowNull: false,
      },
      userId: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'user_id',
      },
      content: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      mediaUrl: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'media_url',
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
        field: 'created_at',
      },
      updatedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
        field: 'updated_at',
      },
    },
    {
      sequelize,
      tableName: POSTS_TABLE,
      timestamps: true,
      underscored: true,
    }
  );

  PostMappingModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      userId: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'user_id',
      },
      postId: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'post_id',
        references: {
          model: POSTS_TABLE,
          key: 'id',
        },
        onDelete: 'CASCADE',
      },
      comments: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      liked: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      disliked: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
        field: 'created_at',
      },
      updatedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
        field: 'updated_at',
      },
    },
    {
      sequelize,
      tableName: POST_MAPPINGS_TABLE,
      timestamps: true,
      underscored: true,
    }
  );

  PostModel.hasMany(PostMappingModel, { foreignKey: 'postId', as: MAPPINGS_ALIAS, onDelete: 'CASCADE' });
  PostMappingModel.belongsTo(PostModel, { foreignKey: 'postId' });

  return { Post: PostModel, PostMapping: PostMappingModel };
};
