export type Json = string | number | boolean | null | { [key: string]: Json } | Json[];

export type UserType = "customer" | "business";
export type OfferType = "basic" | "standard" | "premium";
export type OrderStatus = "pending" | "in_progress" | "completed" | "cancelled";

export type Database = {
  public: {
    Tables: {
      users: {
        Row: {
          id: number;
          auth_user_id: string;
          username: string;
          email: string;
          first_name: string;
          last_name: string;
          user_type: UserType;
          is_staff: boolean;
          created_at: string;
        };
        Insert: {
          id?: number;
          auth_user_id: string;
          username: string;
          email: string;
          first_name?: string;
          last_name?: string;
          user_type: UserType;
          is_staff?: boolean;
          created_at?: string;
        };
        Update: {
          username?: string;
          email?: string;
          first_name?: string;
          last_name?: string;
          is_staff?: boolean;
        };
        Relationships: [];
      };
      business_profiles: {
        Row: {
          id: number;
          user_id: number;
          company_name: string;
          description: string;
          tel: string;
          email: string;
          location: string;
          working_hours: string;
          file: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: number;
          user_id: number;
          company_name?: string;
          description?: string;
          tel?: string;
          email?: string;
          location?: string;
          working_hours?: string;
          file?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          company_name?: string;
          description?: string;
          tel?: string;
          email?: string;
          location?: string;
          working_hours?: string;
          file?: string | null;
          updated_at?: string;
        };
        Relationships: [];
      };
      customer_profiles: {
        Row: {
          id: number;
          user_id: number;
          description: string;
          tel: string;
          email: string;
          location: string;
          file: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: number;
          user_id: number;
          description?: string;
          tel?: string;
          email?: string;
          location?: string;
          file?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          description?: string;
          tel?: string;
          email?: string;
          location?: string;
          file?: string | null;
          updated_at?: string;
        };
        Relationships: [];
      };
      offers: {
        Row: {
          id: number;
          creator_id: number;
          title: string;
          description: string;
          image: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: number;
          creator_id: number;
          title: string;
          description?: string;
          image?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          title?: string;
          description?: string;
          image?: string | null;
          updated_at?: string;
        };
        Relationships: [];
      };
      offer_details: {
        Row: {
          id: number;
          offer_id: number;
          offer_type: OfferType;
          title: string;
          revisions: number;
          delivery_time_in_days: number;
          price: number;
          features: string[];
        };
        Insert: {
          id?: number;
          offer_id: number;
          offer_type: OfferType;
          title: string;
          revisions?: number;
          delivery_time_in_days: number;
          price: number;
          features?: string[];
        };
        Update: {
          title?: string;
          revisions?: number;
          delivery_time_in_days?: number;
          price?: number;
          features?: string[];
        };
        Relationships: [];
      };
      orders: {
        Row: {
          id: number;
          customer_user_id: number;
          business_user_id: number;
          offer_id: number | null;
          offer_detail_id: number | null;
          title: string;
          revisions: number;
          delivery_time_in_days: number;
          price: number;
          features: string[];
          offer_type: OfferType;
          status: OrderStatus;
          completed_at: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: number;
          customer_user_id: number;
          business_user_id: number;
          offer_id?: number | null;
          offer_detail_id?: number | null;
          title: string;
          revisions: number;
          delivery_time_in_days: number;
          price: number;
          features: string[];
          offer_type: OfferType;
          status?: OrderStatus;
          completed_at?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          status?: OrderStatus;
          completed_at?: string | null;
          updated_at?: string;
        };
        Relationships: [];
      };
      reviews: {
        Row: {
          id: number;
          business_user_id: number;
          reviewer_id: number;
          rating: number;
          description: string;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: number;
          business_user_id: number;
          reviewer_id: number;
          rating: number;
          description?: string;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          rating?: number;
          description?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
    };
    Views: {
      offer_summaries: {
        Row: {
          id: number;
          creator_id: number;
          title: string;
          description: string;
          image: string | null;
          created_at: string;
          updated_at: string;
          min_price: number;
          min_delivery_time: number;
          creator_username: string;
          creator_first_name: string;
          creator_last_name: string;
        };
        Relationships: [];
      };
      profile_details: {
        Row: {
          user: number;
          username: string;
          first_name: string;
          last_name: string;
          file: string | null;
          location: string | null;
          tel: string | null;
          description: string | null;
          working_hours: string | null;
          type: UserType;
          email: string | null;
          created_at: string | null;
        };
        Relationships: [];
      };
      review_stats: {
        Row: {
          review_count: number;
          average_rating: number | null;
        };
        Relationships: [];
      };
    };
    Functions: {
      register_account: {
        Args: {
          p_auth_user_id: string;
          p_username: string;
          p_email: string;
          p_first_name: string;
          p_last_name: string;
          p_user_type: UserType;
        };
        Returns: number;
      };
      create_offer_with_details: {
        Args: {
          p_creator_id: number;
          p_title: string;
          p_description: string;
          p_image: string | null;
          p_details: Json;
        };
        Returns: number;
      };
      update_offer_with_details: {
        Args: {
          p_offer_id: number;
          p_title: string | null;
          p_description: string | null;
          p_image: string | null;
          p_set_image: boolean;
          p_details: Json;
        };
        Returns: undefined;
      };
      create_order_from_offer_detail: {
        Args: {
          p_offer_detail_id: number;
          p_customer_user_id: number;
        };
        Returns: Database["public"]["Tables"]["orders"]["Row"];
      };
      update_profile: {
        Args: {
          p_user_id: number;
          p_changes: Json;
        };
        Returns: undefined;
      };
    };
    Enums: {
      user_type: UserType;
      offer_type: OfferType;
      order_status: OrderStatus;
    };
    CompositeTypes: {
      [_ in never]: never;
    };
  };
};

export type Tables<T extends keyof Database["public"]["Tables"]> =
  Database["public"]["Tables"][T]["Row"];

export type Views<T extends keyof Database["public"]["Views"]> =
  Database["public"]["Views"][T]["Row"];
