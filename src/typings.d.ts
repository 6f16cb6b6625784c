declare type Nullable<T> = T | null;
